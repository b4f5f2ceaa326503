import type { Diagnostic } from "../types/diagnostic.js";
import { diag } from "../types/diagnostic.js";
import type { InterfaceAnalysis } from "../types/interfaces.js";
import { analyzeInterfaces } from "../interfaces/analysis.js";
import { countLocated, inferInterfaces } from "../interfaces/inference.js";
import { createContext, runCommand, type CommandOptions, type CommandResult } from "./context.js";

export type InterfacesResult = CommandResult<{ analysis: InterfaceAnalysis; diagnostics: Diagnostic[] }>;

export async function interfaces(opts: CommandOptions & { ref: string }): Promise<InterfacesResult> {
  return runCommand(async () => {
    const ctx = createContext(opts);
    const baseline = await ctx.load(opts.ref);
    const geometry = baseline.geometric_properties;

    const diagnostics: Diagnostic[] = [];
    const skipped = Object.keys(geometry).length - countLocated(geometry);
    if (skipped > 0) {
      diagnostics.push(
        diag("info", "INTERFACE_DATA_INCOMPLETE", `${skipped} component(s) without envelope or center of mass skipped`, {
          details: { skipped },
        }),
      );
    }

    const analysis = analyzeInterfaces(inferInterfaces(geometry, ctx.config.interfaces));
    for (const rec of analysis.recommendations) {
      diagnostics.push(diag(rec.level, rec.code, rec.message));
    }
    return { analysis, diagnostics };
  });
}
