import type { Baseline } from "../types/baseline.js";
import { BaselineStore } from "../baseline/store.js";
import { createContext, runCommand, type CommandOptions, type CommandResult } from "./context.js";

export type SnapshotResult = CommandResult<{ baseline: Baseline; path: string }>;

/** Extract (or re-validate) a baseline and store it as `config_baseline_<id>.json` under `outDir`. */
export async function snapshot(opts: CommandOptions & { model: string; outDir: string }): Promise<SnapshotResult> {
  return runCommand(async () => {
    const ctx = createContext(opts);
    const baseline = await ctx.load(opts.model);
    const path = new BaselineStore(opts.outDir, ctx.registry).write(baseline);
    return { baseline, path };
  });
}
