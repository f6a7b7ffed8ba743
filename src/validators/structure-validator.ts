import type { ComponentView } from "../model/schema.js";

import { createFinding, FINDING_CODES, type Finding } from "./findings.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function validateComponentStructure(component: ComponentView): Finding[] {
  const findings: Finding[] = [];

  if (component.endpoints.length === 0) {
    findings.push(
      createFinding("structure", FINDING_CODES.componentWithoutEndpoints, {
        component: component.name,
        detail: `Component '${component.name}' has no endpoints defined.`,
      }),
    );
  }

  for (const unit of component.behavioralUnits) {
    if (unit.trigger === "periodic" && unit.period === null) {
      findings.push(
        createFinding("structure", FINDING_CODES.periodicUnitWithoutPeriod, {
          component: component.name,
          subject: unit.name,
          detail: `Behavioral unit '${unit.name}' in component '${component.name}' is periodic but has no period defined.`,
        }),
      );
    }
  }

  // Registration rejects duplicates; views built by other means may still carry them.
  for (const name of findDuplicateNames(component.endpoints)) {
    findings.push(
      createFinding("structure", FINDING_CODES.duplicateEndpointName, {
        component: component.name,
        subject: name,
        detail: `Endpoint name '${name}' is used more than once in component '${component.name}'.`,
      }),
    );
  }

  for (const name of findDuplicateNames(component.behavioralUnits)) {
    findings.push(
      createFinding("structure", FINDING_CODES.duplicateBehavioralUnitName, {
        component: component.name,
        subject: name,
        detail: `Behavioral unit name '${name}' is used more than once in component '${component.name}'.`,
      }),
    );
  }

  return findings;
}

// =============================================================================
// INTERNALS
// =============================================================================

function findDuplicateNames(items: readonly { name: string }[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const item of items) {
    if (seen.has(item.name)) {
      duplicates.add(item.name);
    } else {
      seen.add(item.name);
    }
  }

  return Array.from(duplicates);
}
