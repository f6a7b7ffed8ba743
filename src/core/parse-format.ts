/*
Purpose: shared wording for YAML parse failures and zod issues in config and composition files.
Usage: formatIssues(result.error.issues), describeParseFailure(err).
*/

import type { ZodIssue } from "zod";

export type YamlErrorLocation = {
  line: number;
  column: number;
};

export function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!error || typeof error !== "object") {
    return null;
  }

  if (!("mark" in error)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!mark || typeof mark !== "object" || !("line" in mark) || !("column" in mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function describeParseFailure(error: unknown): string {
  const detail = error instanceof Error ? error.message : String(error);
  const location = resolveYamlErrorLocation(error);
  const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
  return `${locationDetail}: ${detail}`;
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "invalid_enum_value") {
        const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
        return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}
