import { Command } from "commander";

import type { ColorMode, ProjectConfig } from "../core/config.js";

import { composeCommand } from "./compose.js";
import { loadConfigForCli } from "./config.js";
import { exportCommand } from "./export.js";
import { initCommand } from "./init.js";
import { emitJsonError } from "./output.js";
import { showCommand } from "./show.js";
import { validateCommand } from "./validate.js";

const parseInteger = (value: string): number => parseInt(value, 10);

export function buildCli(): Command {
  const program = new Command();

  const resolveConfig = (): ProjectConfig => {
    const globals = program.opts();
    const { config } = loadConfigForCli({ explicitConfigPath: globals.config });
    const color: ColorMode = globals.color === false ? "never" : config.output.color;
    return { ...config, output: { ...config.output, color } };
  };

  program
    .name("archweave")
    .description("Compose, validate and export component architecture descriptions")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override project config path (defaults to the nearest .archweave/config.yaml)",
    )
    .option("--debug", "Show error codes, causes and stack traces")
    .option("--no-debug", "Hide error details (default)")
    .option("--no-color", "Disable ANSI colors");

  program
    .command("init")
    .description("Write a default .archweave/config.yaml")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts) => {
      await initCommand({ force: opts.force });
    });

  program
    .command("validate")
    .description("Validate one or more composition documents (JSON or YAML)")
    .argument("<files...>", "Document paths or glob patterns")
    .option("--json", "Emit a JSON envelope instead of text", false)
    .option("--pretty", "Pretty-print JSON output", false)
    .option("--log-file <path>", "Append JSONL validation events to this file")
    .action(async (files: string[], opts) => {
      try {
        await validateCommand(resolveConfig(), {
          patterns: files,
          json: opts.json,
          pretty: opts.pretty,
          logFile: opts.logFile,
        });
      } catch (err) {
        if (!opts.json) throw err;
        emitJsonError(err, { useJson: true, prettyJson: opts.pretty });
      }
    });

  program
    .command("show")
    .description("Print a composition document as a tree")
    .argument("<file>", "Document path")
    .action(async (file: string) => {
      await showCommand({ file });
    });

  program
    .command("export")
    .description("Validate a composition document and write it as normalized JSON")
    .argument("<file>", "Document path")
    .requiredOption("-o, --output <path>", "Output JSON path")
    .option("--indent <n>", "JSON indentation (default: config export.indent)", parseInteger)
    .option("--skip-invalid", "Do not write when validation reports findings", false)
    .option("--log-file <path>", "Append JSONL validation and export events to this file")
    .action(async (file: string, opts) => {
      await exportCommand(resolveConfig(), {
        file,
        output: opts.output,
        indent: opts.indent,
        skipInvalid: opts.skipInvalid,
        logFile: opts.logFile,
      });
    });

  program
    .command("compose")
    .description("Build a composition interactively, validate it and optionally export it")
    .option("-o, --output <path>", "Write the JSON document here without asking")
    .option("--indent <n>", "JSON indentation (default: config export.indent)", parseInteger)
    .action(async (opts) => {
      await composeCommand(resolveConfig(), { output: opts.output, indent: opts.indent });
    });

  return program;
}
