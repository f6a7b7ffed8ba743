// Validation findings.
// Purpose: define the structured record every validator returns and the stable codes
// the CLI, logs and JSON output key on.

export const FINDING_CATEGORIES = ["structure", "endpoint-matching", "topology"] as const;
export type FindingCategory = (typeof FINDING_CATEGORIES)[number];

export const FINDING_CODES = {
  componentWithoutEndpoints: "COMPONENT_WITHOUT_ENDPOINTS",
  periodicUnitWithoutPeriod: "PERIODIC_UNIT_WITHOUT_PERIOD",
  duplicateEndpointName: "DUPLICATE_ENDPOINT_NAME",
  duplicateBehavioralUnitName: "DUPLICATE_BEHAVIORAL_UNIT_NAME",
  unmatchedOutboundEndpoint: "UNMATCHED_OUTBOUND_ENDPOINT",
  unmatchedInboundEndpoint: "UNMATCHED_INBOUND_ENDPOINT",
  topologyCycle: "TOPOLOGY_CYCLE",
} as const;

export type FindingCode = (typeof FINDING_CODES)[keyof typeof FINDING_CODES];

export type Finding = {
  severity: "error";
  category: FindingCategory;
  code: FindingCode;
  /** Component the finding is about. */
  component: string;
  /** Endpoint or behavioral unit name, when the finding targets one. */
  subject?: string;
  detail: string;
  /** Closed walk for topology findings, starting and ending at `component`. */
  cycle?: string[];
};

export function createFinding(
  category: FindingCategory,
  code: FindingCode,
  fields: Omit<Finding, "severity" | "category" | "code">,
): Finding {
  return { severity: "error", category, code, ...fields };
}

export function countFindingsByCategory(
  findings: readonly Finding[],
): Record<FindingCategory, number> {
  const counts: Record<FindingCategory, number> = {
    structure: 0,
    "endpoint-matching": 0,
    topology: 0,
  };

  for (const finding of findings) {
    counts[finding.category] += 1;
  }

  return counts;
}
