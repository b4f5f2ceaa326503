import type { BaselineCtlConfig } from "../types/config.js";
import type { Baseline } from "../types/baseline.js";
import { ComponentNotFoundError, isBaselineCtlError, type ErrorCode } from "../errors.js";
import { loadConfig } from "../config/loader.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { CommandExtractionService, type GeometryExtractionService } from "../baseline/extraction.js";
import { loadBaseline } from "../baseline/loader.js";

/** Options every command accepts. */
export type CommandOptions = {
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  schemaDir?: string;
  /** Overrides the extractor built from `extractor_command`. */
  extractor?: GeometryExtractionService;
};

export type CommandError = {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
};

export type CommandResult<T> = ({ ok: true } & T) | { ok: false; error: CommandError };

export type CommandContext = {
  config: BaselineCtlConfig;
  registry: SchemaRegistry;
  extractor?: GeometryExtractionService;
  load: (ref: string, label?: string) => Promise<Baseline>;
};

export function createContext(opts: CommandOptions): CommandContext {
  const config = loadConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env });
  const registry = createRegistry(opts.schemaDir);
  const extractor =
    opts.extractor ??
    (config.extractor_command
      ? new CommandExtractionService({ command: config.extractor_command, args: config.extractor_args })
      : undefined);

  return {
    config,
    registry,
    extractor,
    load: (ref, label) => loadBaseline(ref, { registry, extractor, label }),
  };
}

/**
 * Run a command body, turning expected failures into `{ ok: false }`.
 * Anything that is not a BaselineCtlError propagates to the CLI.
 */
export async function runCommand<T>(body: () => Promise<T>): Promise<CommandResult<T>> {
  try {
    return { ok: true as const, ...(await body()) };
  } catch (err) {
    if (!isBaselineCtlError(err)) throw err;
    return { ok: false, error: { code: err.code, message: err.message, ...errorDetails(err) } };
  }
}

function errorDetails(err: Error): Pick<CommandError, "details"> {
  if (err instanceof ComponentNotFoundError) {
    return { details: { suggestions: err.suggestions, remaining: err.remaining } };
  }
  return {};
}
