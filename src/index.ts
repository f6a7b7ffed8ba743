#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  // Subcommands copy settings only when created, so configure each one after buildCli().
  for (const command of [program, ...program.commands]) {
    command.configureOutput({
      outputError: (_message: string, _write: (chunk: string) => void) => undefined,
    });
    command.exitOverride();
  }
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  const options = program.opts<{ debug?: boolean }>();
  return Boolean(options.debug);
}

function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }

    if (arg === "--debug") {
      debugFlag = true;
    }

    if (arg === "--no-debug") {
      debugFlag = false;
    }
  }

  return debugFlag;
}

function resolveColorFlagFromArgv(argv: string[]): boolean | undefined {
  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--no-color") return false;
  }

  return undefined;
}

function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const exitCode = error.exitCode;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const debug = resolveDebugEnabled(argv, program);
    const color = resolveColorFlagFromArgv(argv) === false ? "never" : "auto";
    console.error(renderCliError(error, { debug, color }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;

  try {
    // npm links the bin through a symlink; compare the resolved file.
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Allow `node dist/src/index.js` and the linked `archweave` bin
if (isDirectExecution()) {
  void main(process.argv);
}
