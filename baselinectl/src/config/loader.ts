import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { BaselineCtlConfig } from "../types/config.js";
import { ConfigInvalidError } from "../errors.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { validateConfig } from "./validator.js";

export const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

const ENV_PREFIX = "BASELINECTL_";

type ConfigDoc = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigDoc {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two documents. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: ConfigDoc, override: ConfigDoc): ConfigDoc {
  const result: ConfigDoc = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isRecord(val)) {
      const current = result[key];
      result[key] = deepMerge(isRecord(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Parsed YAML mapping, or an empty one when the file is absent or empty. */
function loadYaml(filePath: string): ConfigDoc {
  if (!fs.existsSync(filePath)) return {};
  const doc: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (doc === null || doc === undefined) return {};
  if (!isRecord(doc)) {
    throw new ConfigInvalidError(`${filePath} must contain a mapping`);
  }
  return doc;
}

/** Apply BASELINECTL_ prefixed environment variable overrides (top-level keys). */
function applyEnvOverrides(config: ConfigDoc, env: NodeJS.ProcessEnv): ConfigDoc {
  const result = { ...config };
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // BASELINECTL_REPORT_DIR → report_dir
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    result[configKey] = configKey === "extractor_args" ? value.split(/\s+/).filter(Boolean) : value;
  }
  return result;
}

export type LoadConfigOptions = {
  /** Overlay name: loads `<configDir>/<envName>.yaml` over base.yaml. */
  envName?: string;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
};

/** Merged config document before validation: defaults ← base.yaml ← env.yaml ← environment. */
export function loadConfigDocument(opts: LoadConfigOptions = {}): ConfigDoc {
  const dir = opts.configDir ?? CONFIG_DIR;

  let merged = deepMerge({ ...DEFAULT_CONFIG }, loadYaml(path.join(dir, "base.yaml")));

  if (opts.envName) {
    const overlay = path.join(dir, `${opts.envName}.yaml`);
    if (!fs.existsSync(overlay)) {
      throw new ConfigInvalidError(`environment overlay not found: ${overlay}`);
    }
    merged = deepMerge(merged, loadYaml(overlay));
  }

  return applyEnvOverrides(merged, opts.env ?? process.env);
}

/** Load and validate layered config. Throws ConfigInvalidError. */
export function loadConfig(opts: LoadConfigOptions = {}): BaselineCtlConfig {
  const doc = loadConfigDocument(opts);
  const result = validateConfig(doc);
  if (!result.ok) throw new ConfigInvalidError(result.errors);
  return result.config;
}
