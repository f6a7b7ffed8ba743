import { defaultProjectConfig, type ProjectConfig } from "../core/config.js";
import { resolveProjectConfigPath, type ConfigResolution } from "../core/config-discovery.js";
import { loadProjectConfig } from "../core/config-loader.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// --config wins; otherwise the nearest .archweave/config.yaml above the working
// directory; otherwise built-in defaults, so the tool works without any setup.
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export type LoadedCliConfig = {
  config: ProjectConfig;
  resolution: ConfigResolution;
};

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): LoadedCliConfig {
  const resolution = resolveProjectConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd,
  });

  if (resolution.configPath === null) {
    return { config: defaultProjectConfig(), resolution };
  }

  return { config: loadProjectConfig(resolution.configPath), resolution };
}
