import type { CompositionView, EndpointDirection } from "../model/schema.js";

import { createFinding, FINDING_CODES, type Finding } from "./findings.js";

type EndpointInstance = {
  component: string;
  endpoint: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Reports every outbound endpoint whose name has no inbound endpoint anywhere in the
 * composition, then every inbound endpoint without an outbound one. Matching is by name
 * only, so an endpoint pair on the same component also counts as matched.
 */
export function validateEndpointMatching(composition: CompositionView): Finding[] {
  const outbound: EndpointInstance[] = [];
  const inbound: EndpointInstance[] = [];
  const namesByDirection: Record<EndpointDirection, Set<string>> = {
    outbound: new Set(),
    inbound: new Set(),
  };

  for (const component of composition.components) {
    for (const endpoint of component.endpoints) {
      const instance = { component: component.name, endpoint: endpoint.name };
      namesByDirection[endpoint.direction].add(endpoint.name);
      if (endpoint.direction === "outbound") {
        outbound.push(instance);
      } else {
        inbound.push(instance);
      }
    }
  }

  const findings: Finding[] = [];

  for (const instance of outbound) {
    if (!namesByDirection.inbound.has(instance.endpoint)) {
      findings.push(
        createFinding("endpoint-matching", FINDING_CODES.unmatchedOutboundEndpoint, {
          component: instance.component,
          subject: instance.endpoint,
          detail: `Outbound endpoint '${instance.endpoint}' on component '${instance.component}' has no matching inbound counterpart.`,
        }),
      );
    }
  }

  for (const instance of inbound) {
    if (!namesByDirection.outbound.has(instance.endpoint)) {
      findings.push(
        createFinding("endpoint-matching", FINDING_CODES.unmatchedInboundEndpoint, {
          component: instance.component,
          subject: instance.endpoint,
          detail: `Inbound endpoint '${instance.endpoint}' on component '${instance.component}' has no matching outbound counterpart.`,
        }),
      );
    }
  }

  return findings;
}
