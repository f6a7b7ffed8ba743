import fs from "node:fs";
import path from "node:path";

// =============================================================================
// CONSTANTS
// =============================================================================

const PROJECT_CONFIG_DIR = ".archweave";
const PROJECT_CONFIG_FILE = "config.yaml";

const DEFAULT_CONFIG_YAML = `# archweave project config
export:
  # JSON indentation used by \`archweave export\` and \`archweave compose\`.
  indent: 4

validation:
  structure: true
  endpoints: true
  topology: true

log:
  # JSONL event log of validation runs; relative to this file. null disables it.
  file: null

output:
  # auto | always | never
  color: auto
`;

// =============================================================================
// TYPES
// =============================================================================

export type ConfigResolution =
  | { configPath: string; source: "explicit" | "project" }
  | { configPath: null; source: "defaults" };

export type InitResult = {
  projectRoot: string;
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  if (args.explicitPath) {
    return { configPath: path.resolve(args.explicitPath), source: "explicit" };
  }

  const found = findProjectConfig(args.cwd ?? process.cwd());
  if (found) {
    return { configPath: found, source: "project" };
  }

  return { configPath: null, source: "defaults" };
}

export function initProjectConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = path.resolve(args.cwd ?? process.cwd());
  const projectRoot = findRepoRoot(cwd) ?? cwd;
  const configPath = projectConfigPath(projectRoot);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { projectRoot, configPath, status: "exists" };
  }

  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf8");

  return { projectRoot, configPath, status: hasConfig ? "overwritten" : "created" };
}

export function findProjectConfig(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    const candidate = projectConfigPath(current);
    if (fs.existsSync(candidate)) {
      return candidate;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function findRepoRoot(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    if (fs.existsSync(path.join(current, ".git"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function projectConfigPath(projectRoot: string): string {
  return path.join(projectRoot, PROJECT_CONFIG_DIR, PROJECT_CONFIG_FILE);
}
