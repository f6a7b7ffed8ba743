import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { JsonlLogger, logExportEvent } from "../core/logger.js";
import { defaultRunId } from "../core/utils.js";
import type { Composition } from "../model/composition.js";
import { writeCompositionFile } from "../model/document.js";
import { buildValidationReport } from "../validators/composition-validator.js";
import { renderValidationReport } from "../validators/report-format.js";

import { loadCompositionForCli } from "./composition-input.js";
import { createStdoutFormatter } from "./output.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExportCommandOptions = {
  file: string;
  output: string;
  indent?: number;
  skipInvalid?: boolean;
  logFile?: string;
  cwd?: string;
};

export type ExportCommandResult =
  | { status: "written"; outputPath: string; bytes: number; findings: number }
  | { status: "skipped"; findings: number };

// =============================================================================
// COMMAND
// =============================================================================

export async function exportCommand(
  config: ProjectConfig,
  opts: ExportCommandOptions,
): Promise<ExportCommandResult> {
  const cwd = opts.cwd ?? process.cwd();
  const indent = resolveIndent(opts.indent, config.export.indent);
  const composition = await loadCompositionForCli(path.resolve(cwd, opts.file));
  const format = createStdoutFormatter(config.output.color);

  const runId = defaultRunId();
  const logFile = opts.logFile ?? config.log.file;
  const logger = logFile
    ? new JsonlLogger(path.resolve(cwd, logFile), { runId, source: "export" })
    : undefined;

  try {
    const report = buildValidationReport(composition, { checks: config.validation, logger });
    if (!report.valid) {
      console.log(renderValidationReport(report, { format }));
      if (opts.skipInvalid) {
        console.log("Export skipped: the composition has validation findings.");
        process.exitCode = 1;
        return { status: "skipped", findings: report.findings.length };
      }
    }

    const written = await writeExport(composition, path.resolve(cwd, opts.output), indent);
    if (logger) {
      logExportEvent(logger, {
        composition: composition.name,
        outputPath: written.outputPath,
        components: composition.size,
        bytes: written.bytes,
      });
    }

    console.log(`Exported composition "${composition.name}" to ${written.outputPath}`);
    return { status: "written", ...written, findings: report.findings.length };
  } finally {
    logger?.close();
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export async function writeExport(
  composition: Composition,
  outputPath: string,
  indent: number,
): Promise<{ outputPath: string; bytes: number }> {
  try {
    return await writeCompositionFile(composition, outputPath, { indent });
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.export,
      title: "Export failed.",
      message: `Could not write ${outputPath}: ${formatErrorMessage(err)}`,
      hint: "Check that the directory is writable and the path is not a directory.",
      cause: err,
    });
  }
}

export function resolveIndent(requested: number | undefined, fallback: number): number {
  if (requested === undefined) return fallback;
  if (!Number.isInteger(requested) || requested < 1 || requested > 8) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.export,
      title: "Invalid indent.",
      message: `--indent must be a whole number between 1 and 8, received ${requested}.`,
    });
  }
  return requested;
}
