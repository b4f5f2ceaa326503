import { extractBom, type BomQueryResult } from "../query/extract.js";
import { createContext, runCommand, type CommandOptions, type CommandResult } from "./context.js";

export type BomResult = CommandResult<{ bom: BomQueryResult }>;

export async function bom(opts: CommandOptions & { ref: string }): Promise<BomResult> {
  return runCommand(async () => {
    const ctx = createContext(opts);
    return { bom: extractBom(await ctx.load(opts.ref)) };
  });
}
