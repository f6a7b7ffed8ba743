import type { ColorMode } from "../core/config.js";
import {
  createAnsiFormatter,
  formatErrorMessage,
  resolveColorEnabled,
  type AnsiFormatter,
} from "../core/error-format.js";
import {
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "../core/errors.js";

// =============================================================================
// JSON SHAPES
// =============================================================================

export type CliJsonError = {
  code: UserFacingErrorCode;
  message: string;
  hint?: string;
};

export type CliJsonEnvelope<T> =
  | {
      ok: true;
      result: T;
    }
  | {
      ok: false;
      error: CliJsonError;
    };

export type CliOutputOptions = {
  useJson: boolean;
  prettyJson: boolean;
};

// =============================================================================
// OUTPUT EMITTERS
// =============================================================================

export function emitResult<T>(result: T, output: CliOutputOptions): void {
  writeJson({ ok: true, result }, output);
}

export function emitJsonError(error: unknown, output: CliOutputOptions): void {
  writeJson({ ok: false, error: toJsonError(error) }, output);
  process.exitCode = 1;
}

export function createStdoutFormatter(color: ColorMode | undefined): AnsiFormatter {
  return createAnsiFormatter(resolveColorEnabled({ stream: process.stdout, mode: color }));
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function writeJson(envelope: CliJsonEnvelope<unknown>, output: CliOutputOptions): void {
  const payload = output.prettyJson ? JSON.stringify(envelope, null, 2) : JSON.stringify(envelope);
  console.log(payload);
}

function toJsonError(error: unknown): CliJsonError {
  if (error instanceof UserFacingError) {
    const json: CliJsonError = { code: error.code, message: error.message };
    if (error.hint) json.hint = error.hint;
    return json;
  }

  return { code: USER_FACING_ERROR_CODES.unknown, message: formatErrorMessage(error) };
}
