import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { defaultProjectConfig, type ProjectConfig } from "../../core/config.js";

export const COMPOSITION_FIXTURES = fileURLToPath(
  new URL("../../../test/fixtures/compositions/", import.meta.url),
);

export function compositionFixture(name: string): string {
  return path.join(COMPOSITION_FIXTURES, name);
}

/** Defaults with color forced off so rendered output is plain text. */
export function plainConfig(overrides: Partial<ProjectConfig> = {}): ProjectConfig {
  return { ...defaultProjectConfig(), output: { color: "never" }, ...overrides };
}

export function createTempDirTracker(prefix: string): {
  make: () => string;
  cleanup: () => void;
} {
  const dirs: string[] = [];

  return {
    make: () => {
      const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
      dirs.push(dir);
      return dir;
    },
    cleanup: () => {
      for (const dir of dirs.splice(0)) {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    },
  };
}

export function readJsonLines(filePath: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(filePath, "utf8")
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}
