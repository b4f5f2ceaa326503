import { analyzeBaseline, type BaselineAnalysis } from "../query/analyze.js";
import { createContext, runCommand, type CommandOptions, type CommandResult } from "./context.js";

export type AnalyzeResult = CommandResult<{ analysis: BaselineAnalysis }>;

export async function analyze(opts: CommandOptions & { ref: string; now?: Date }): Promise<AnalyzeResult> {
  return runCommand(async () => {
    const ctx = createContext(opts);
    const baseline = await ctx.load(opts.ref);
    return { analysis: analyzeBaseline(baseline, { compliance: ctx.config.compliance, now: opts.now }) };
  });
}
