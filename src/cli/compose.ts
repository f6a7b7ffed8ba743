import path from "node:path";

import { confirm, runComposeSession, type ComposeIo } from "../core/compose-session.js";
import type { ProjectConfig } from "../core/config.js";
import { slugify } from "../core/utils.js";
import type { Composition } from "../model/composition.js";
import { renderComposition } from "../model/render.js";
import {
  buildValidationReport,
  type ValidationReport,
} from "../validators/composition-validator.js";
import { renderValidationReport } from "../validators/report-format.js";

import { ConsoleComposeIo } from "./compose-io.js";
import { resolveIndent, writeExport } from "./export.js";

// =============================================================================
// TYPES
// =============================================================================

export type ComposeCommandOptions = {
  output?: string;
  indent?: number;
  cwd?: string;
};

export type ComposeCommandResult = {
  composition: Composition;
  report: ValidationReport;
  exportedTo: string | null;
};

type ClosableComposeIo = ComposeIo & { close?: () => void };

// =============================================================================
// COMMAND
// =============================================================================

export async function composeCommand(
  config: ProjectConfig,
  opts: ComposeCommandOptions,
  io: ClosableComposeIo = new ConsoleComposeIo(),
): Promise<ComposeCommandResult> {
  const cwd = opts.cwd ?? process.cwd();
  const indent = resolveIndent(opts.indent, config.export.indent);

  try {
    io.note("archweave composition builder");
    const composition = await runComposeSession(io);

    io.note("");
    io.note(renderComposition(composition));

    const report = buildValidationReport(composition, { checks: config.validation });
    io.note("");
    io.note(renderValidationReport(report));

    const target = await resolveExportTarget(io, composition, opts.output);
    if (!target) {
      io.note("JSON export skipped.");
      return { composition, report, exportedTo: null };
    }

    const written = await writeExport(composition, path.resolve(cwd, target), indent);
    io.note(`Exported composition "${composition.name}" to ${written.outputPath}`);
    return { composition, report, exportedTo: written.outputPath };
  } finally {
    io.close?.();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function resolveExportTarget(
  io: ComposeIo,
  composition: Composition,
  explicitOutput: string | undefined,
): Promise<string | null> {
  if (explicitOutput) return explicitOutput;

  if (!(await confirm(io, "Export the composition to a JSON file"))) {
    return null;
  }

  const fallback = `${slugify(composition.name) || "composition"}.json`;
  const answer = await io.ask(`File name (default: ${fallback})`);
  return answer.length > 0 ? answer : fallback;
}
