import type { Baseline } from "../types/baseline.js";
import type { ComplianceCheck, ComplianceReport } from "../types/compliance.js";
import type { ComplianceConfig } from "../types/config.js";
import { DEFAULT_COMPLIANCE } from "../config/defaults.js";

function checkMetadata(baseline: Baseline): ComplianceCheck {
  const present = baseline.metadata !== undefined && Object.keys(baseline.metadata).length > 0;
  return present
    ? { name: "metadata", status: "pass", message: "Metadata present" }
    : { name: "metadata", status: "warning", message: "Metadata missing or incomplete" };
}

function checkSchema(baseline: Baseline, validSchemas: readonly string[]): ComplianceCheck {
  const schema = baseline.metadata?.schema ?? "";
  return validSchemas.some((s) => schema.includes(s))
    ? { name: "schema", status: "pass", message: `Valid schema: ${schema}` }
    : { name: "schema", status: "warning", message: `Non-standard schema: ${schema}` };
}

function checkHierarchy(baseline: Baseline, maxDepth: number): ComplianceCheck {
  const depth = baseline.bom.reduce((max, item) => Math.max(max, item.level), 0);
  return depth <= maxDepth
    ? { name: "hierarchy", status: "pass", message: `Hierarchy depth acceptable: ${depth} level(s)` }
    : { name: "hierarchy", status: "warning", message: `Excessive hierarchy depth: ${depth} level(s)` };
}

function checkNaming(baseline: Baseline): ComplianceCheck {
  const unnamed = baseline.bom.filter((item) => item.name.trim() === "").length;
  return unnamed > 0
    ? { name: "naming", status: "fail", message: `${unnamed} component(s) without a name` }
    : { name: "naming", status: "pass", message: "All components are named" };
}

function checkGeometry(baseline: Baseline): ComplianceCheck {
  const count = Object.keys(baseline.geometric_properties).length;
  return count > 0
    ? { name: "geometry", status: "pass", message: `${count} component(s) with geometric properties` }
    : { name: "geometry", status: "fail", message: "Geometric properties not computed" };
}

function checkDuplicates(baseline: Baseline): ComplianceCheck {
  const counts = baseline.bom.reduce(
    (acc, item) => acc.set(item.name, (acc.get(item.name) ?? 0) + 1),
    new Map<string, number>(),
  );
  const duplicates = [...counts.values()].filter((n) => n > 1).length;
  return duplicates > 0
    ? { name: "duplicates", status: "warning", message: `${duplicates} duplicated component name(s)` }
    : { name: "duplicates", status: "pass", message: "No duplicated names" };
}

/** Rule checks over one baseline: metadata, schema, hierarchy, naming, geometry, duplicates. */
export function checkCompliance(baseline: Baseline, opts: Partial<ComplianceConfig> = {}): ComplianceReport {
  const checks = [
    checkMetadata(baseline),
    checkSchema(baseline, opts.valid_schemas ?? DEFAULT_COMPLIANCE.valid_schemas),
    checkHierarchy(baseline, opts.max_depth ?? DEFAULT_COMPLIANCE.max_depth),
    checkNaming(baseline),
    checkGeometry(baseline),
    checkDuplicates(baseline),
  ];

  const failures = checks.filter((c) => c.status === "fail").length;
  const warnings = checks.filter((c) => c.status === "warning").length;
  const passed = checks.filter((c) => c.status === "pass").length;

  let overall: Pick<ComplianceReport, "overall_status" | "overall_message">;
  if (failures > 0) {
    overall = { overall_status: "fail", overall_message: `${failures} check(s) failed` };
  } else if (warnings > 0) {
    overall = { overall_status: "warning", overall_message: `${warnings} warning(s)` };
  } else {
    overall = { overall_status: "pass", overall_message: "All checks passed" };
  }

  return {
    ...overall,
    checks,
    statistics: { total_checks: checks.length, passed, warnings, failures },
  };
}
