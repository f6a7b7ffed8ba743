import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { JsonlLogger } from "../core/logger.js";
import { defaultRunId } from "../core/utils.js";
import {
  buildValidationReport,
  type ValidationReport,
} from "../validators/composition-validator.js";
import { renderValidationReport } from "../validators/report-format.js";

import { loadCompositionForCli, resolveCompositionPaths } from "./composition-input.js";
import { createStdoutFormatter, emitResult } from "./output.js";

// =============================================================================
// TYPES
// =============================================================================

export type ValidateCommandOptions = {
  patterns: string[];
  json?: boolean;
  pretty?: boolean;
  logFile?: string;
  cwd?: string;
};

export type SourcedValidationReport = ValidationReport & { source: string };

export type ValidateCommandResult = {
  run_id: string;
  valid: boolean;
  reports: SourcedValidationReport[];
};

// =============================================================================
// COMMAND
// =============================================================================

export async function validateCommand(
  config: ProjectConfig,
  opts: ValidateCommandOptions,
): Promise<ValidateCommandResult> {
  const cwd = opts.cwd ?? process.cwd();
  const files = await resolveCompositionPaths(opts.patterns, cwd);
  const runId = defaultRunId();
  const logger = openValidationLogger(opts.logFile ?? config.log.file, cwd, runId);

  const reports: SourcedValidationReport[] = [];
  try {
    for (const file of files) {
      const composition = await loadCompositionForCli(file);
      const report = buildValidationReport(composition, {
        checks: config.validation,
        logger,
      });
      reports.push({ source: path.relative(cwd, file) || file, ...report });
    }
  } finally {
    logger?.close();
  }

  const result: ValidateCommandResult = {
    run_id: runId,
    valid: reports.every((report) => report.valid),
    reports,
  };

  if (opts.json) {
    emitResult(result, { useJson: true, prettyJson: opts.pretty ?? false });
  } else {
    const format = createStdoutFormatter(config.output.color);
    const showSource = reports.length > 1;
    for (const report of reports) {
      console.log(
        renderValidationReport(report, { format, source: showSource ? report.source : undefined }),
      );
    }
  }

  if (!result.valid) {
    process.exitCode = 1;
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function openValidationLogger(
  logFile: string | null | undefined,
  cwd: string,
  runId: string,
): JsonlLogger | undefined {
  if (!logFile) return undefined;
  return new JsonlLogger(path.resolve(cwd, logFile), { runId, source: "validate" });
}
