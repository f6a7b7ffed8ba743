import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { createTempDirTracker, plainConfig } from "./helpers/fixtures.js";
import { ScriptedComposeIo } from "./helpers/scripted-io.js";
import { composeCommand } from "../cli/compose.js";
import { initCommand } from "../cli/init.js";
import { loadConfigForCli } from "../cli/config.js";
import { renderComposition } from "../model/render.js";

const tempDirs = createTempDirTracker("archweave-cli-");

afterEach(() => {
  tempDirs.cleanup();
});

// Two components linked by "speed", then no further components.
const PAIR_ANSWERS = [
  "Speed Pair",
  "yes",
  "Sensor",
  "Sensor",
  "yes",
  "speed",
  "outbound",
  "no",
  "no",
  "no",
  "yes",
  "Display",
  "HMI",
  "yes",
  "speed",
  "inbound",
  "no",
  "no",
  "no",
  "no",
];

describe("acceptance: init", () => {
  it("creates, keeps and overwrites the project config", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const dir = tempDirs.make();
    const configPath = path.join(dir, ".archweave", "config.yaml");

    await initCommand({ cwd: dir });
    fs.writeFileSync(configPath, "export:\n  indent: 2\n", "utf8");
    await initCommand({ cwd: dir });
    const kept = fs.readFileSync(configPath, "utf8");
    await initCommand({ cwd: dir, force: true });

    expect(logSpy.mock.calls).toEqual([
      [`Created project config at ${configPath}`],
      [`Config already exists at ${configPath} (use --force to overwrite).`],
      [`Overwrote project config at ${configPath}`],
    ]);
    expect(kept).toBe("export:\n  indent: 2\n");
    expect(loadConfigForCli({ cwd: dir }).config.export.indent).toBe(4);
  });

  it("falls back to defaults when no config exists", () => {
    const dir = tempDirs.make();

    expect(loadConfigForCli({ cwd: dir }).resolution).toEqual({
      configPath: null,
      source: "defaults",
    });
  });
});

describe("acceptance: compose", () => {
  it("builds, validates and exports to the default file name", async () => {
    const dir = tempDirs.make();
    const io = new ScriptedComposeIo([...PAIR_ANSWERS, "yes", ""]);

    const result = await composeCommand(plainConfig(), { cwd: dir }, io);
    const target = path.join(dir, "speed-pair.json");

    expect(io.remaining).toBe(0);
    expect(io.closed).toBe(true);
    expect(result.report.valid).toBe(true);
    expect(result.exportedTo).toBe(target);
    expect(io.questions.slice(-2)).toEqual([
      "Export the composition to a JSON file (yes/no)",
      "File name (default: speed-pair.json)",
    ]);
    expect(io.notes).toEqual([
      "archweave composition builder",
      "",
      renderComposition(result.composition),
      "",
      'Composition "Speed Pair" is valid.',
      `Exported composition "Speed Pair" to ${target}`,
    ]);

    const document = JSON.parse(fs.readFileSync(target, "utf8"));
    expect(document.composition_name).toBe("Speed Pair");
    expect(document.components.map((component: { name: string }) => component.name)).toEqual([
      "Sensor",
      "Display",
    ]);
  });

  it("skips the export when declined", async () => {
    const dir = tempDirs.make();
    const io = new ScriptedComposeIo([...PAIR_ANSWERS, "no"]);

    const result = await composeCommand(plainConfig(), { cwd: dir }, io);

    expect(result.exportedTo).toBeNull();
    expect(io.notes.at(-1)).toBe("JSON export skipped.");
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it("writes straight to --output without asking", async () => {
    const dir = tempDirs.make();
    const io = new ScriptedComposeIo(PAIR_ANSWERS);

    const result = await composeCommand(
      plainConfig(),
      { cwd: dir, output: "arch/pair.json", indent: 2 },
      io,
    );

    const target = path.join(dir, "arch", "pair.json");
    expect(result.exportedTo).toBe(target);
    expect(io.questions).not.toContain("Export the composition to a JSON file (yes/no)");
    expect(fs.readFileSync(target, "utf8").split("\n")[1]).toBe(
      '  "composition_name": "Speed Pair",',
    );
  });

  it("shows findings for an invalid composition before exporting", async () => {
    const dir = tempDirs.make();
    const io = new ScriptedComposeIo(["Lonely", "yes", "Idle", "Service", "no", "no", "no", "no", "no"]);

    const result = await composeCommand(plainConfig(), { cwd: dir }, io);

    expect(result.report.valid).toBe(false);
    expect(io.notes[4]).toBe(
      [
        'Composition "Lonely" has 1 finding.',
        "Structure:",
        "  - Component 'Idle' has no endpoints defined. [COMPONENT_WITHOUT_ENDPOINTS]",
      ].join("\n"),
    );
  });

  it("closes the prompt even when the session fails", async () => {
    const io = new ScriptedComposeIo(["Broken"]);

    await expect(composeCommand(plainConfig(), {}, io)).rejects.toThrow(
      'No scripted answer left for "Add a component (yes/no)"',
    );
    expect(io.closed).toBe(true);
  });
});
