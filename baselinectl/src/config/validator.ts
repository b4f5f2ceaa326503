import { createAjv, type AjvValidateFn } from "../schema/ajv.js";
import type { BaselineCtlConfig } from "../types/config.js";

const positive = { type: "number", exclusiveMinimum: 0 } as const;

const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "report_dir", "tolerances", "interfaces", "compliance"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    report_dir: { type: "string", minLength: 1 },
    extractor_command: { type: "string", minLength: 1 },
    extractor_args: { type: "array", items: { type: "string" } },
    tolerances: {
      type: "object",
      required: ["geometry_epsilon", "envelope", "hole_position", "hole_diameter", "interface_distance_delta"],
      properties: {
        geometry_epsilon: { type: "number", minimum: 0 },
        envelope: { type: "number", minimum: 0 },
        hole_position: positive,
        hole_diameter: { type: "number", minimum: 0 },
        interface_distance_delta: { type: "number", minimum: 0 },
      },
    },
    interfaces: {
      type: "object",
      required: ["reject_ratio", "contact_ratio", "proximity_ratio", "axis_tolerance", "diameter_tolerance", "max_components"],
      properties: {
        reject_ratio: positive,
        contact_ratio: positive,
        proximity_ratio: positive,
        axis_tolerance: positive,
        diameter_tolerance: { type: "number", minimum: 0 },
        max_components: { type: "integer", minimum: 2 },
        time_budget_ms: { type: "integer", minimum: 1 },
      },
    },
    compliance: {
      type: "object",
      required: ["valid_schemas", "max_depth"],
      properties: {
        valid_schemas: { type: "array", items: { type: "string", minLength: 1 }, minItems: 1 },
        max_depth: { type: "integer", minimum: 0 },
      },
    },
  },
};

export type ConfigValidationResult =
  | { ok: true; config: BaselineCtlConfig }
  | { ok: false; errors: string };

const ajv = createAjv();
let compiled: AjvValidateFn<BaselineCtlConfig> | null = null;

/** Validate a merged config document against the config schema. */
export function validateConfig(doc: unknown): ConfigValidationResult {
  compiled ??= ajv.compile<BaselineCtlConfig>(CONFIG_SCHEMA);
  if (compiled(doc)) return { ok: true, config: doc };
  return { ok: false, errors: ajv.errorsText(compiled.errors, { separator: "; " }) };
}
