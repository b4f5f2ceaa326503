import { compareBaselines, type ComparisonResult } from "../compare/comparator.js";
import { ReportWriter, type WrittenReport } from "../report/writer.js";
import { createContext, runCommand, type CommandOptions, type CommandResult } from "./context.js";

export type CompareOptions = CommandOptions & {
  baseline1: string;
  baseline2: string;
  /** Write the JSON report here; falls back to `report_dir` when `writeReport` is set. */
  reportDir?: string;
  writeReport?: boolean;
  now?: Date;
};

export type CompareResult = CommandResult<{
  result: ComparisonResult;
  report?: Pick<WrittenReport, "path" | "sha256">;
}>;

/**
 * Load two baselines (or model files), compare them and optionally persist
 * the comparison report.
 */
export async function compare(opts: CompareOptions): Promise<CompareResult> {
  return runCommand(async () => {
    const ctx = createContext(opts);
    const b1 = await ctx.load(opts.baseline1, "Baseline 1");
    const b2 = await ctx.load(opts.baseline2, "Baseline 2");

    const result = compareBaselines(b1, b2, {
      tolerances: ctx.config.tolerances,
      interfaces: ctx.config.interfaces,
    });

    const reportDir = opts.reportDir ?? (opts.writeReport ? ctx.config.report_dir : undefined);
    if (!reportDir) return { result };

    const written = new ReportWriter(reportDir, ctx.registry).write(result, opts.now);
    return { result, report: { path: written.path, sha256: written.sha256 } };
  });
}
