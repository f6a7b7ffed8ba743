import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { describeParseFailure, formatIssues } from "./parse-format.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [
        k,
        expandEnv(v, { ...ctx, trail: [...ctx.trail, k] }),
      ]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT = "Run `archweave init` or drop --config to use the defaults.";
const INVALID_CONFIG_HINT =
  "Fix the config file and rerun. For a fresh config, run `archweave init --force`.";

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Project config missing.",
    message: `Project config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(configPath: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Project config invalid.",
    message: `Project config at ${configPath} is invalid.`,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown, configPath: string): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(configPath, error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadProjectConfig(configPath: string): ProjectConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read project config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${describeParseFailure(err)}`,
        err,
      );
    }

    // An empty file means "all defaults".
    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

    const parsed = ProjectConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid project config at ${absolutePath}:\n${details}`, parsed.error);
    }

    const cfg = parsed.data;
    const configDir = path.dirname(absolutePath);

    return {
      ...cfg,
      log: {
        file: cfg.log.file === null ? null : path.resolve(configDir, cfg.log.file),
      },
    };
  } catch (err) {
    throwNormalizedConfigError(err, absolutePath);
  }
}
