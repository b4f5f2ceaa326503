import type { ComplianceReport } from "../types/compliance.js";
import { checkCompliance } from "../compliance/checker.js";
import { createContext, runCommand, type CommandOptions, type CommandResult } from "./context.js";

export type ValidateResult = CommandResult<{ report: ComplianceReport }>;

/** Compliance checks over one baseline. A failed check is still `ok: true`; see `report.overall_status`. */
export async function validate(opts: CommandOptions & { ref: string }): Promise<ValidateResult> {
  return runCommand(async () => {
    const ctx = createContext(opts);
    return { report: checkCompliance(await ctx.load(opts.ref), ctx.config.compliance) };
  });
}
