import { initProjectConfig, type InitResult } from "../core/config-discovery.js";

export async function initCommand(opts: { force?: boolean; cwd?: string }): Promise<InitResult> {
  const result = initProjectConfig({ cwd: opts.cwd, force: opts.force });

  if (result.status === "exists") {
    console.log(`Config already exists at ${result.configPath} (use --force to overwrite).`);
  } else if (result.status === "overwritten") {
    console.log(`Overwrote project config at ${result.configPath}`);
  } else {
    console.log(`Created project config at ${result.configPath}`);
  }

  return result;
}
