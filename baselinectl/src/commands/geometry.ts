import { extractGeometry, type GeometryQueryResult } from "../query/extract.js";
import { createContext, runCommand, type CommandOptions, type CommandResult } from "./context.js";

export type GeometryResult = CommandResult<{ geometry: GeometryQueryResult }>;

/** Geometric properties of a baseline, optionally narrowed to one component (name, path or glob). */
export async function geometry(opts: CommandOptions & { ref: string; component?: string }): Promise<GeometryResult> {
  return runCommand(async () => {
    const ctx = createContext(opts);
    return { geometry: extractGeometry(await ctx.load(opts.ref), opts.component) };
  });
}
