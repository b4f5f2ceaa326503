#!/usr/bin/env node

import { Command } from "commander";
import type { Diagnostic } from "./types/diagnostic.js";
import type { ComparisonResult } from "./compare/comparator.js";
import type { ComplianceReport } from "./types/compliance.js";
import type { InterfaceAnalysis } from "./types/interfaces.js";
import { bomToCsv, type BomQueryResult, type GeometryQueryResult } from "./query/extract.js";
import type { BaselineAnalysis } from "./query/analyze.js";
import type { CommandError, CommandOptions } from "./commands/context.js";
import { analyze } from "./commands/analyze.js";
import { compare } from "./commands/compare.js";
import { bom } from "./commands/bom.js";
import { geometry } from "./commands/geometry.js";
import { interfaces } from "./commands/interfaces.js";
import { validate } from "./commands/validate.js";
import { snapshot } from "./commands/snapshot.js";
import { configValidate } from "./commands/config.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";

type Format = "human" | "jsonl";

type GlobalOpts = { config?: string; env?: string; format: Format };

const program = new Command();

program
  .name("baselinectl")
  .description("Configuration baseline comparison for mechanical assemblies")
  .version("0.1.0");

function withGlobals(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory")
    .option("--env <name>", "Config overlay to apply over base.yaml")
    .option("--format <format>", "Output format: human|jsonl", "human");
}

function commandOptions(opts: GlobalOpts): CommandOptions {
  return { configDir: opts.config, envName: opts.env };
}

function writeLine(obj: unknown): void {
  process.stdout.write(JSON.stringify(obj) + "\n");
}

function emitDiagnostics(format: Format, diagnostics: readonly Diagnostic[]): void {
  for (const d of diagnostics) {
    if (format === "jsonl") writeLine(d);
    else console.error(`[${d.level}] ${d.message}`);
  }
}

function fail(format: Format, error: CommandError): never {
  if (format === "jsonl") {
    writeLine({ level: "error", ...error });
  } else {
    console.error(error.message);
  }
  process.exit(exitCodeFor(error.code));
}

function printComparison(result: ComparisonResult): void {
  const { baseline1, baseline2 } = result.baselines;
  console.log(`${baseline1.id} → ${baseline2.id}`);
  if (result.identical) {
    console.log("Identical (same checksum)");
    return;
  }
  console.log(`Impact: ${result.impact.level} (${result.impact.message})`);
  const s = result.summary;
  console.log(
    `Changes: ${s.total_changes} (added ${s.components_added}, removed ${s.components_removed}, geometry ${s.geometry_changes}, interfaces ${s.interface_changes})`,
  );
  for (const c of result.changes.components_added) console.log(`  + ${c.name}`);
  for (const c of result.changes.components_removed) console.log(`  - ${c.name}`);
  for (const m of result.changes.components_modified) console.log(`  ~ ${m.name}: ${m.changes.join(", ")}`);
  for (const t of result.changes.topology) console.log(`  ~ ${t.description}`);
  for (const i of result.interfaces.removed) console.log(`  - interface: ${i.description}`);
  for (const i of result.interfaces.added) console.log(`  + interface: ${i.description}`);
  for (const i of result.interfaces.modified) console.log(`  ~ interface ${i.component1} ↔ ${i.component2}: ${i.change_description}`);
}

function printBom(result: BomQueryResult): void {
  for (const item of result.items) {
    console.log(`${"  ".repeat(item.level)}${item.position}. ${item.name} (${item.type}) x${item.quantity}`);
  }
  console.log(`${result.total_count} item(s), max depth ${result.max_depth}`);
}

function printGeometry(result: GeometryQueryResult): void {
  for (const [entry, props] of Object.entries(result.components)) {
    console.log(`${props.unique_name ?? props.name} [${entry}]: volume ${props.volume}, surface ${props.surface_area ?? 0}`);
  }
  const t = result.totals;
  console.log(`Total: ${t.component_count} component(s), volume ${t.volume_mm3} mm³, surface ${t.surface_mm2} mm²`);
}

function printInterfaces(analysis: InterfaceAnalysis): void {
  for (const i of analysis.interfaces) console.log(`[${i.severity}] ${i.description}`);
  const { by_type } = analysis.summary;
  console.log(
    `${analysis.summary.total_interfaces} interface(s): ${by_type.fastening} fastening, ${by_type.contact} contact, ${by_type.proximity} proximity`,
  );
}

function printAnalysis(analysis: BaselineAnalysis): void {
  const { metadata, bom, components, geometry } = analysis;
  console.log(`${analysis.baseline_id} (${analysis.file})`);
  if (metadata.schema) console.log(`Schema: ${metadata.schema}`);
  if (metadata.author) console.log(`Author: ${metadata.author}`);
  console.log(`BOM: ${bom.total_count} item(s), max depth ${bom.max_depth}`);
  console.log(`Components: ${components.total_unique} unique, ${components.total_instances} instance(s)`);
  console.log(
    `Geometry: ${geometry.totals.component_count} component(s), volume ${geometry.totals.volume_mm3} mm³, surface ${geometry.totals.surface_mm2} mm²`,
  );
  console.log(`Colors: ${Object.keys(analysis.colors).length}, dependency roots: ${Object.keys(analysis.dependencies).length}`);
  printCompliance(analysis.validation);
}

function printCompliance(report: ComplianceReport): void {
  for (const c of report.checks) console.log(`[${c.status.toUpperCase()}] ${c.name}: ${c.message}`);
  console.log(`${report.overall_status.toUpperCase()}: ${report.overall_message}`);
}

withGlobals(
  program
    .command("compare")
    .description("Compare two baselines (JSON or model files) and classify the impact")
    .argument("<baseline1>", "Reference baseline")
    .argument("<baseline2>", "Candidate baseline")
    .option("--report-dir <path>", "Write the JSON comparison report to this directory")
    .option("--report", "Write the JSON comparison report to the configured report_dir"),
).action(async (baseline1: string, baseline2: string, opts: GlobalOpts & { reportDir?: string; report?: boolean }) => {
  const res = await compare({
    ...commandOptions(opts),
    baseline1,
    baseline2,
    reportDir: opts.reportDir,
    writeReport: opts.report,
  });
  if (!res.ok) fail(opts.format, res.error);

  emitDiagnostics(opts.format, res.result.diagnostics);
  if (opts.format === "jsonl") {
    const { diagnostics: _diagnostics, ...result } = res.result;
    writeLine({ level: "info", code: "COMPARISON", ...result, report: res.report });
  } else {
    printComparison(res.result);
    if (res.report) console.log(`Report: ${res.report.path} (sha256 ${res.report.sha256})`);
  }
});

withGlobals(
  program.command("analyze").description("Report metadata, structure, geometry and compliance of one baseline").argument("<ref>", "Baseline JSON or model file"),
).action(async (ref: string, opts: GlobalOpts) => {
  const res = await analyze({ ...commandOptions(opts), ref });
  if (!res.ok) fail(opts.format, res.error);
  if (opts.format === "jsonl") {
    writeLine({ level: "info", code: "ANALYSIS", ...res.analysis });
  } else {
    printAnalysis(res.analysis);
  }
});

withGlobals(
  program
    .command("bom")
    .description("Print the bill of materials of a baseline")
    .argument("<ref>", "Baseline JSON or model file")
    .option("--csv", "Print the BOM as semicolon-separated values"),
).action(async (ref: string, opts: GlobalOpts & { csv?: boolean }) => {
  const res = await bom({ ...commandOptions(opts), ref });
  if (!res.ok) fail(opts.format, res.error);
  if (opts.csv) {
    process.stdout.write(bomToCsv(res.bom.items));
  } else if (opts.format === "jsonl") {
    for (const item of res.bom.items) writeLine(item);
  } else {
    printBom(res.bom);
  }
});

withGlobals(
  program
    .command("geometry")
    .description("Print geometric properties of a baseline")
    .argument("<ref>", "Baseline JSON or model file")
    .option("--component <name>", "Component name, unique name, path or glob"),
).action(async (ref: string, opts: GlobalOpts & { component?: string }) => {
  const res = await geometry({ ...commandOptions(opts), ref, component: opts.component });
  if (!res.ok) fail(opts.format, res.error);
  if (opts.format === "jsonl") {
    writeLine(res.geometry);
  } else {
    printGeometry(res.geometry);
  }
});

withGlobals(
  program.command("interfaces").description("Infer mechanical interfaces within one baseline").argument("<ref>", "Baseline JSON or model file"),
).action(async (ref: string, opts: GlobalOpts) => {
  const res = await interfaces({ ...commandOptions(opts), ref });
  if (!res.ok) fail(opts.format, res.error);
  if (opts.format === "jsonl") {
    for (const i of res.analysis.interfaces) writeLine(i);
  } else {
    printInterfaces(res.analysis);
  }
  emitDiagnostics(opts.format, res.diagnostics);
});

withGlobals(
  program.command("validate").description("Run compliance checks over one baseline").argument("<ref>", "Baseline JSON or model file"),
).action(async (ref: string, opts: GlobalOpts) => {
  const res = await validate({ ...commandOptions(opts), ref });
  if (!res.ok) fail(opts.format, res.error);
  if (opts.format === "jsonl") {
    for (const c of res.report.checks) writeLine(c);
    writeLine({ level: "info", code: "COMPLIANCE", status: res.report.overall_status, message: res.report.overall_message });
  } else {
    printCompliance(res.report);
  }
  if (res.report.overall_status === "fail") process.exit(EXIT.COMPLIANCE_FAILED);
});

withGlobals(
  program
    .command("snapshot")
    .description("Extract a baseline from a model file and store it")
    .argument("<model>", "Model file (.stp/.step) or baseline JSON")
    .requiredOption("--out <dir>", "Directory for config_baseline_<id>.json"),
).action(async (model: string, opts: GlobalOpts & { out: string }) => {
  const res = await snapshot({ ...commandOptions(opts), model, outDir: opts.out });
  if (!res.ok) fail(opts.format, res.error);
  if (opts.format === "jsonl") {
    writeLine({ level: "info", code: "SNAPSHOT", baseline_id: res.baseline.baseline_id, path: res.path });
  } else {
    console.log(`Baseline ${res.baseline.baseline_id} written to ${res.path}`);
  }
});

const config = program.command("config").description("Configuration commands");

withGlobals(config.command("validate").description("Validate the layered configuration")).action(async (opts: GlobalOpts) => {
  const res = await configValidate(commandOptions(opts));
  if (!res.ok) fail(opts.format, res.error);
  if (opts.format === "jsonl") {
    writeLine({ level: "info", code: "OK", message: "OK" });
  } else {
    console.log("OK");
  }
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
