import fs from "node:fs";
import path from "node:path";
import type { ComparisonResult } from "../compare/comparator.js";
import type { ComparisonReport } from "../types/report.js";
import { computeSha256FromContent } from "../baseline/checksum.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

export type WrittenReport = {
  path: string;
  sha256: string;
  report: ComparisonReport;
};

export function buildReport(result: ComparisonResult, now: Date = new Date()): ComparisonReport {
  return {
    baseline1: result.baselines.baseline1.id,
    baseline2: result.baselines.baseline2.id,
    comparison_date: now.toISOString(),
    identical: result.identical,
    impact_assessment: result.impact.level,
    summary: result.summary,
    impact: result.impact,
    changes: result.changes,
    interfaces: result.interfaces,
  };
}

/** "2026-03-01T08:15:30.123Z" → "20260301T081530" */
export function reportStamp(isoDate: string): string {
  return isoDate.replace(/\.\d+Z$/, "").replace(/Z$/, "").replace(/[-:]/g, "");
}

/**
 * Report Writer — validates a comparison report against its schema and
 * writes it as `comparison_report_<stamp>.json`.
 */
export class ReportWriter {
  private readonly registry: SchemaRegistry;

  constructor(
    private readonly reportDir: string,
    registry?: SchemaRegistry,
  ) {
    this.registry = registry ?? createRegistry();
  }

  write(result: ComparisonResult, now: Date = new Date()): WrittenReport {
    const report = buildReport(result, now);
    const check = this.registry.validate("comparison-report", report);
    if (!check.valid) {
      throw new Error(`Comparison report does not match its schema: ${check.errors}`);
    }

    fs.mkdirSync(this.reportDir, { recursive: true });
    const file = path.join(this.reportDir, `comparison_report_${reportStamp(report.comparison_date)}.json`);
    const json = JSON.stringify(report, null, 2) + "\n";
    fs.writeFileSync(file, json, "utf8");

    return { path: file, sha256: computeSha256FromContent(json), report };
  }
}
