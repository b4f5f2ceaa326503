import fs from "node:fs";
import path from "node:path";
import type { Baseline } from "../types/baseline.js";
import { NotFoundError } from "../errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { readBaselineFile } from "./loader.js";

const FILE_PATTERN = /^config_baseline_(.+)\.json$/;

/**
 * Baseline Store — a directory of `config_baseline_<id>.json` snapshots.
 */
export class BaselineStore {
  constructor(
    private readonly dir: string,
    private readonly registry?: SchemaRegistry,
  ) {}

  pathFor(baselineId: string): string {
    return path.join(this.dir, `config_baseline_${baselineId}.json`);
  }

  read(baselineId: string): Baseline {
    const file = this.pathFor(baselineId);
    if (!fs.existsSync(file)) throw new NotFoundError(file);
    return readBaselineFile(file, file, this.registry);
  }

  /** Write a snapshot and return its path. */
  write(baseline: Baseline): string {
    const file = this.pathFor(baseline.baseline_id);
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(file, JSON.stringify(baseline, null, 2) + "\n", "utf8");
    return file;
  }

  /** Stored baseline ids, sorted. */
  list(): string[] {
    if (!fs.existsSync(this.dir)) return [];
    return fs
      .readdirSync(this.dir)
      .map((f) => FILE_PATTERN.exec(f)?.[1])
      .filter((id): id is string => id !== undefined)
      .sort();
  }
}
