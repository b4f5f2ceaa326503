import fs from "node:fs";
import type { Baseline } from "../types/baseline.js";
import { InvalidBaselineError, NotFoundError } from "../errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { isModelFile, type GeometryExtractionService } from "./extraction.js";

export type LoadBaselineOptions = {
  registry?: SchemaRegistry;
  /** Required to load .stp/.step references. */
  extractor?: GeometryExtractionService;
  /** Name used in error messages; defaults to the reference itself. */
  label?: string;
};

/** Validate an already-parsed document against the baseline schema. */
export function parseBaseline(data: unknown, label: string, registry: SchemaRegistry = createRegistry()): Baseline {
  if (registry.conforms<Baseline>("baseline", data)) return data;
  const { errors } = registry.validate("baseline", data);
  throw new InvalidBaselineError(label, (errors ?? "does not match the baseline schema").split("; "));
}

/** Read a baseline JSON file; unparsable content is an invalid baseline. */
export function readBaselineFile(file: string, label: string, registry?: SchemaRegistry): Baseline {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw new InvalidBaselineError(label, [`not valid JSON (${e instanceof Error ? e.message : String(e)})`]);
  }
  return parseBaseline(data, label, registry);
}

/**
 * Resolve a reference to a Baseline: a model file goes through the
 * extraction service, anything else is read as baseline JSON.
 */
export async function loadBaseline(ref: string, opts: LoadBaselineOptions = {}): Promise<Baseline> {
  const label = opts.label ?? ref;
  if (!fs.existsSync(ref)) throw new NotFoundError(ref);

  if (isModelFile(ref)) {
    if (!opts.extractor) {
      throw new InvalidBaselineError(label, ["model files need an extractor (set extractor_command)"]);
    }
    return parseBaseline(await opts.extractor.extract(ref), label, opts.registry);
  }

  return readBaselineFile(ref, label, opts.registry);
}
