/*
Purpose: turn thrown values into ordered, typed lines that CLI and log renderers can style.
Assumptions: UserFacingError carries title/hint/next; any other value is treated as unexpected.
Usage: formatErrorLines(err, { mode: "short" }), formatErrorMessage(err).
*/

import type { ColorMode } from "./config.js";
import { UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "green" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  green: [32, 39],
  bold: [1, 22],
  dim: [2, 22],
};

const UNEXPECTED_ERROR_TITLE = "Unexpected error";

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: UNEXPECTED_ERROR_TITLE });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (error instanceof UserFacingError) {
    lines.push({ kind: "code", text: error.code });
  }

  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });

    const cause = resolveCause(error);
    if (cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(cause) });
    }

    if (error.stack) {
      lines.push({ kind: "stack", text: error.stack });
    }
  }

  return lines;
}

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  mode?: ColorMode;
}): boolean {
  const mode = options.mode ?? "auto";
  if (mode === "never") return false;
  if (mode === "always") return true;
  if (!options.stream?.isTTY) return false;
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== "") return false;
  return true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveCause(error: Error): unknown {
  const cause: unknown = error.cause;
  return cause === null ? undefined : cause;
}
