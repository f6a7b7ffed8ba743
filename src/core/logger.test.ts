import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonlLogger, eventWithTs, logExportEvent, logValidationEvent } from "./logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

function readEvents(logPath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(logPath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("JsonlLogger", () => {
  it("writes events with run and source metadata", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "nested", "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-1", source: "validate" });

    logger.log({ type: "validation.start", payload: { composition: "Plant" } });
    logger.close();

    const events = readEvents(logPath);
    expect(events).toHaveLength(1);

    const [event] = events;
    expect(event.type).toBe("validation.start");
    expect(event.run_id).toBe("run-1");
    expect(event.source).toBe("validate");
    expect(event.payload).toEqual({ composition: "Plant" });
    expect(new Date(String(event.ts)).toString()).not.toBe("Invalid Date");
  });

  it("appends events without clobbering previous lines", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");

    const first = new JsonlLogger(logPath, { runId: "run-2" });
    first.log({ type: "first", payload: { order: 1 } });
    first.close();

    const second = new JsonlLogger(logPath, { runId: "run-3" });
    second.log({ type: "second", payload: { order: 2 } });
    second.close();

    const events = readEvents(logPath);
    expect(events.map((e) => e.type)).toEqual(["first", "second"]);
    expect(events.map((e) => e.run_id)).toEqual(["run-2", "run-3"]);
  });

  it("ignores events after close", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-4" });

    logger.log({ type: "kept" });
    logger.close();
    logger.log({ type: "dropped" });
    logger.close();

    expect(readEvents(logPath).map((e) => e.type)).toEqual(["kept"]);
  });

  it("logs validation and export helpers under payload", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-5" });

    logValidationEvent(logger, "validation.complete", { composition: "Plant", valid: true });
    logExportEvent(logger, {
      composition: "Plant",
      outputPath: "/tmp/plant.json",
      components: 2,
      bytes: 120,
    });
    logger.close();

    const events = readEvents(logPath);
    expect(events[0]).toMatchObject({
      type: "validation.complete",
      payload: { composition: "Plant", valid: true },
    });
    expect(events[1]).toMatchObject({
      type: "export.write",
      run_id: "run-5",
      payload: {
        composition: "Plant",
        output_path: "/tmp/plant.json",
        components: 2,
        bytes: 120,
      },
    });
  });

  it("warns on write failures with formatted messages", () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
    const logPath = path.join(tmpDir, "events.jsonl");
    const logger = new JsonlLogger(logPath, { runId: "run-6" });

    vi.spyOn(fs, "writeSync").mockImplementation(() => {
      throw new Error("disk full");
    });
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.log({ type: "validation.start" });
    logger.close();

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0]?.[0]).toBe(
      `Warning: failed to write log event to ${logPath}: disk full`,
    );
  });

  it("includes stack details when debug is enabled", () => {
    const originalArgv = [...process.argv];
    process.argv = [...process.argv, "--debug"];

    try {
      const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "jsonl-logger-"));
      const logPath = path.join(tmpDir, "events.jsonl");
      const logger = new JsonlLogger(logPath, { runId: "run-7" });

      const writeError = new Error("disk full");
      writeError.stack = "Error: disk full\n    at fake:1:1";
      vi.spyOn(fs, "writeSync").mockImplementation(() => {
        throw writeError;
      });
      const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      logger.log({ type: "validation.start" });
      logger.close();

      expect(warnSpy.mock.calls[0]?.[0]).toBe(
        `Warning: failed to write log event to ${logPath}: disk full\nError: disk full\n    at fake:1:1`,
      );
    } finally {
      process.argv = originalArgv;
    }
  });
});

describe("eventWithTs", () => {
  it("merges defaults and payload", () => {
    const event = eventWithTs(
      { type: "sample", payload: { key: "value" }, source: "export" },
      { runId: "run-x", source: "validate" },
    );

    expect(event.run_id).toBe("run-x");
    expect(event.source).toBe("export");
    expect(event.type).toBe("sample");
    expect(event.payload).toEqual({ key: "value" });
    expect(new Date(event.ts).toString()).not.toBe("Invalid Date");
  });

  it("omits empty payloads and formats explicit timestamps", () => {
    const event = eventWithTs(
      { type: "sample", payload: {}, ts: new Date("2024-03-01T12:00:00.000Z") },
      { runId: "run-y" },
    );

    expect(event).toEqual({ ts: "2024-03-01T12:00:00.000Z", type: "sample", run_id: "run-y" });
  });

  it("throws when runId is missing", () => {
    expect(() => eventWithTs({ type: "missing-run" })).toThrow(/run_id is required/i);
  });
});
