import path from "node:path";

import fg from "fast-glob";

import {
  CompositionError,
  DocumentError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import type { Composition } from "../model/composition.js";
import { loadCompositionFile } from "../model/document.js";

const DOCUMENT_HINT =
  "Composition documents are JSON or YAML with `composition_name` and `components`.";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Expands CLI arguments into document paths. Literal paths are kept as given so a
 * missing file fails on read; glob patterns must match at least one file.
 */
export async function resolveCompositionPaths(
  patterns: string[],
  cwd: string = process.cwd(),
): Promise<string[]> {
  const resolved: string[] = [];

  for (const pattern of patterns) {
    if (!fg.isDynamicPattern(pattern)) {
      resolved.push(path.resolve(cwd, pattern));
      continue;
    }

    const matches = await fg(pattern, { cwd, absolute: true, onlyFiles: true, dot: false });
    if (matches.length === 0) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.document,
        title: "No composition documents found.",
        message: `Pattern ${pattern} did not match any files in ${cwd}.`,
        hint: "Check the pattern or pass file paths directly.",
      });
    }

    resolved.push(...matches.sort());
  }

  return Array.from(new Set(resolved));
}

export async function loadCompositionForCli(filePath: string): Promise<Composition> {
  try {
    return await loadCompositionFile(filePath);
  } catch (err) {
    throw normalizeCompositionLoadError(err, path.resolve(filePath));
  }
}

export function normalizeCompositionLoadError(error: unknown, filePath: string): unknown {
  if (error instanceof DocumentError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.document,
      title: "Composition document unreadable.",
      message: error.message,
      hint: DOCUMENT_HINT,
      cause: error.cause,
    });
  }

  if (error instanceof CompositionError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.composition,
      title: "Composition rejected.",
      message: `${filePath}: ${error.message}`,
      hint: "Fix the document so every name is unique and interfaces reference existing ports.",
      cause: error,
    });
  }

  return error;
}
