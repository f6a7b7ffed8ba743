import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  source?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  source?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  runId?: string;
  source?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  log(event: LogEventInput): void {
    const normalized = eventWithTs(event, this.defaults);
    this.append(normalized);
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, source, payload, ts, type } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const resolvedSource = source ?? defaults.source;

  const result: LogEvent = {
    ts: normalizedTs,
    type,
    run_id: runId,
  };

  if (resolvedSource) {
    result.source = resolvedSource;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

export function logValidationEvent(
  logger: JsonlLogger,
  type: `validation.${string}`,
  payload: JsonObject,
): void {
  logger.log({ type, payload });
}

export function logExportEvent(
  logger: JsonlLogger,
  details: { composition: string; outputPath: string; components: number; bytes: number },
): void {
  logger.log({
    type: "export.write",
    payload: {
      composition: details.composition,
      output_path: details.outputPath,
      components: details.components,
      bytes: details.bytes,
    },
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = resolveDebugStack(error);
  if (!stack) {
    return message;
  }

  return `${message}\n${stack}`;
}

function resolveDebugStack(error: unknown): string | undefined {
  const lines = formatErrorLines(error, { mode: "debug" });
  const stackLine = lines.find((line) => line.kind === "stack");
  return stackLine?.text;
}

function resolveLoggerDebugEnabled(): boolean {
  const argvFlag = resolveDebugFlagFromArgv(process.argv);
  return argvFlag ?? false;
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
