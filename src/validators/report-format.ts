/*
Purpose: human-readable rendering of a validation report for terminal output.
Usage: console.log(renderValidationReport(report, { format })).
*/

import type { AnsiFormatter } from "../core/error-format.js";

import type { ValidationReport } from "./composition-validator.js";
import { FINDING_CATEGORIES, type FindingCategory } from "./findings.js";

const CATEGORY_LABELS: Record<FindingCategory, string> = {
  structure: "Structure",
  "endpoint-matching": "Endpoint matching",
  topology: "Topology",
};

export function renderValidationReport(
  report: ValidationReport,
  options: { format?: AnsiFormatter; source?: string } = {},
): string {
  const format: AnsiFormatter = options.format ?? ((text) => text);
  const heading = options.source ? `${options.source}: ` : "";

  if (report.valid) {
    return `${heading}${format(`Composition "${report.composition}" is valid.`, ["green"])}`;
  }

  const count = report.findings.length;
  const lines = [
    `${heading}${format(
      `Composition "${report.composition}" has ${count} finding${count === 1 ? "" : "s"}.`,
      ["red", "bold"],
    )}`,
  ];

  for (const category of FINDING_CATEGORIES) {
    const findings = report.findings.filter((finding) => finding.category === category);
    if (findings.length === 0) continue;

    lines.push(`${CATEGORY_LABELS[category]}:`);
    for (const finding of findings) {
      lines.push(`  - ${finding.detail} ${format(`[${finding.code}]`, ["dim"])}`);
    }
  }

  return lines.join("\n");
}
