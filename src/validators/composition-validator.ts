// Composition validation orchestrator.
// Purpose: run structural, endpoint-matching and topology checks over one frozen snapshot
// and return their findings in a stable order.
// Assumes the composition is fully built before the call; nothing here mutates it.

import { logValidationEvent, type JsonObject, type JsonlLogger } from "../core/logger.js";
import { captureCompositionView } from "../model/composition.js";
import { buildAdjacency, connectedGroups, type CompositionAdjacency } from "../model/graph.js";
import type { CompositionView } from "../model/schema.js";

import { validateEndpointMatching } from "./endpoint-validator.js";
import { countFindingsByCategory, type Finding, type FindingCategory } from "./findings.js";
import { validateComponentStructure } from "./structure-validator.js";
import { validateTopology } from "./topology-validator.js";

// =============================================================================
// TYPES
// =============================================================================

export type ValidationChecks = {
  structure: boolean;
  endpoints: boolean;
  topology: boolean;
};

export type ValidateCompositionOptions = {
  checks?: Partial<ValidationChecks>;
  logger?: JsonlLogger;
};

export type ValidationSummary = {
  components: number;
  endpoints: number;
  links: number;
  connected_groups: number;
  findings: Record<FindingCategory, number>;
};

export type ValidationReport = {
  composition: string;
  valid: boolean;
  findings: Finding[];
  summary: ValidationSummary;
};

export const DEFAULT_VALIDATION_CHECKS: ValidationChecks = {
  structure: true,
  endpoints: true,
  topology: true,
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function validateComposition(
  composition: CompositionView,
  options: ValidateCompositionOptions = {},
): Finding[] {
  return buildValidationReport(composition, options).findings;
}

export function buildValidationReport(
  composition: CompositionView,
  options: ValidateCompositionOptions = {},
): ValidationReport {
  const view = captureCompositionView(composition);
  const adjacency = buildAdjacency(view);
  const checks = { ...DEFAULT_VALIDATION_CHECKS, ...options.checks };
  const logger = options.logger;

  if (logger) {
    logValidationEvent(logger, "validation.start", {
      composition: view.name,
      components: view.components.length,
      checks,
    });
  }

  const findings = runChecks(view, adjacency, checks);

  if (logger) {
    for (const finding of findings) {
      logValidationEvent(logger, "validation.finding", findingPayload(finding));
    }
  }

  const summary = summarize(view, adjacency, findings);

  if (logger) {
    logValidationEvent(logger, "validation.complete", {
      composition: view.name,
      valid: findings.length === 0,
      findings: summary.findings,
    });
  }

  return {
    composition: view.name,
    valid: findings.length === 0,
    findings,
    summary,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function runChecks(
  view: CompositionView,
  adjacency: CompositionAdjacency,
  checks: ValidationChecks,
): Finding[] {
  const findings: Finding[] = [];

  if (checks.structure) {
    for (const component of view.components) {
      findings.push(...validateComponentStructure(component));
    }
  }

  if (checks.endpoints) {
    findings.push(...validateEndpointMatching(view));
  }

  if (checks.topology) {
    findings.push(...validateTopology(view, adjacency));
  }

  return findings;
}

function summarize(
  view: CompositionView,
  adjacency: CompositionAdjacency,
  findings: Finding[],
): ValidationSummary {
  return {
    components: view.components.length,
    endpoints: view.components.reduce((total, component) => total + component.endpoints.length, 0),
    links: adjacency.linkCount,
    connected_groups: connectedGroups(adjacency).length,
    findings: countFindingsByCategory(findings),
  };
}

function findingPayload(finding: Finding): JsonObject {
  const payload: JsonObject = {
    category: finding.category,
    code: finding.code,
    component: finding.component,
    detail: finding.detail,
  };
  if (finding.subject !== undefined) payload.subject = finding.subject;
  if (finding.cycle !== undefined) payload.cycle = finding.cycle;
  return payload;
}
