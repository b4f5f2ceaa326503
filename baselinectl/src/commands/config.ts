import type { BaselineCtlConfig } from "../types/config.js";
import { loadConfig } from "../config/loader.js";
import { runCommand, type CommandOptions, type CommandResult } from "./context.js";

export type ConfigValidateResult = CommandResult<{ config: BaselineCtlConfig }>;

/** Load the layered config and report whether it validates. */
export async function configValidate(opts: CommandOptions): Promise<ConfigValidateResult> {
  return runCommand(async () => ({
    config: loadConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env }),
  }));
}
