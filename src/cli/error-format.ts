/*
Purpose: render user-facing errors for CLI output with optional color.
Assumptions: stderr is the default stream; "auto" color follows the stream's TTY state.
Usage: console.error(renderCliError(err, { debug: isDebugEnabled, color: config.output.color }));
*/

import type { ColorMode } from "../core/config.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  color?: ColorMode;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(error, { mode });

  const stream = options.stream ?? process.stderr;
  const useColor = resolveColorEnabled({ stream, mode: options.color });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
    case "name":
    case "cause":
      return `${format(`${capitalize(line.kind)}:`, ["dim"])} ${format(line.text, ["dim"])}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indentMultiline(line.text, 2), ["dim"])}`;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
