import fs from "node:fs";
import path from "node:path";
import { createAjv, type AjvInstance, type AjvValidateFn } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck = { valid: boolean; errors: string | null };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");

/**
 * Schema registry — loads every *.schema.json in a directory and compiles
 * validators on demand. The baseline schema is the persisted-file contract.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = createAjv();

  constructor(private readonly schemaDir: string) {}

  load(): this {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"))) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "baseline.schema.json" → "baseline"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }

    return this;
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version, for report headers. */
  versions(): Record<string, string> {
    return Object.fromEntries([...this.entries].map(([name, entry]) => [name, entry.version]));
  }

  private validator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  validate(name: string, data: unknown): SchemaCheck {
    const validate = this.validator(name);
    const valid = validate(data);
    return { valid, errors: valid ? null : this.ajv.errorsText(validate.errors, { separator: "; " }) };
  }

  /** Narrow `data` to `T` when it satisfies the named schema. */
  conforms<T>(name: string, data: unknown): data is T {
    return this.validator(name)(data);
  }
}

/** Version from the schema's $id suffix ("...@1.0.0"). */
function extractVersion(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null || !("$id" in schema)) return null;
  const id = schema.$id;
  if (typeof id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)/.exec(id);
  return m ? m[1] : null;
}

let shared: SchemaRegistry | null = null;

/** Registry over the bundled schemas directory (or an explicit one). */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  if (!schemaDir) {
    shared ??= new SchemaRegistry(DEFAULT_SCHEMA_DIR).load();
    return shared;
  }
  return new SchemaRegistry(schemaDir).load();
}
