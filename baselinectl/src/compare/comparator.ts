import type { Baseline } from "../types/baseline.js";
import { REQUIRED_BASELINE_FIELDS } from "../types/baseline.js";
import type { ChangeSet } from "../types/changes.js";
import type { TolerancesConfig } from "../types/config.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { diag } from "../types/diagnostic.js";
import type { ImpactReport } from "../types/impact.js";
import type { Interface, InterfaceDiff } from "../types/interfaces.js";
import { DEFAULT_TOLERANCES } from "../config/defaults.js";
import { InvalidBaselineError } from "../errors.js";
import { diffBom } from "../diff/bom-differ.js";
import { diffGeometry } from "../diff/geometry-differ.js";
import { diffMetadata } from "../diff/metadata-differ.js";
import { diffTopology } from "../diff/topology-differ.js";
import { classifyImpact } from "../impact/classifier.js";
import { countLocated, inferInterfaces, type InferenceOptions } from "../interfaces/inference.js";
import { diffInterfaces } from "../interfaces/interface-differ.js";

export type ComparisonOptions = {
  tolerances?: Partial<TolerancesConfig>;
  interfaces?: InferenceOptions;
};

export type BaselineSummary = {
  id: string;
  file: string;
  checksum: string;
  timestamp: string;
};

export type ComparisonSummary = {
  total_changes: number;
  components_added: number;
  components_removed: number;
  geometry_changes: number;
  interface_changes: number;
};

export type ComparisonResult = {
  /** True when both checksums match; no differ ran. */
  identical: boolean;
  baselines: { baseline1: BaselineSummary; baseline2: BaselineSummary };
  changes: ChangeSet;
  interfaces: InterfaceDiff;
  impact: ImpactReport;
  summary: ComparisonSummary;
  diagnostics: Diagnostic[];
};

/** Required keys absent from a baseline-shaped object. */
export function missingBaselineFields(candidate: object): string[] {
  return REQUIRED_BASELINE_FIELDS.filter((key) => !Object.hasOwn(candidate, key));
}

function assertComplete(label: string, baseline: Baseline): void {
  const missing = missingBaselineFields(baseline);
  if (missing.length > 0) {
    throw new InvalidBaselineError(label, missing.map((k) => `missing required field '${k}'`));
  }
}

function summarizeBaseline(b: Baseline): BaselineSummary {
  return { id: b.baseline_id, file: b.file, checksum: b.checksum, timestamp: b.timestamp };
}

function emptyChangeSet(b: Baseline): ChangeSet {
  const schema = b.metadata?.schema ?? "";
  return {
    components_added: [],
    components_removed: [],
    components_modified: [],
    geometry: [],
    topology: [],
    metadata: {
      schema_changed: false,
      schema_before: schema,
      schema_after: schema,
      products_added: [],
      products_removed: [],
      changes: [],
    },
  };
}

function summarize(changes: ChangeSet, interfaces: InterfaceDiff): ComparisonSummary {
  const interfaceChanges = interfaces.added.length + interfaces.removed.length + interfaces.modified.length;
  return {
    total_changes:
      changes.components_added.length +
      changes.components_removed.length +
      changes.components_modified.length +
      changes.topology.length +
      interfaceChanges,
    components_added: changes.components_added.length,
    components_removed: changes.components_removed.length,
    geometry_changes: changes.topology.length,
    interface_changes: interfaceChanges,
  };
}

function inferWithDiagnostics(label: string, baseline: Baseline, opts: InferenceOptions, out: Diagnostic[]): Interface[] {
  const total = Object.keys(baseline.geometric_properties).length;
  const skipped = total - countLocated(baseline.geometric_properties);
  if (skipped > 0) {
    out.push(
      diag("info", "INTERFACE_DATA_INCOMPLETE", `${label}: ${skipped} component(s) without envelope or center of mass skipped`, {
        details: { skipped },
      }),
    );
  }
  return inferInterfaces(baseline.geometric_properties, opts);
}

/**
 * Full comparison of two baselines.
 *
 * Equal checksums short-circuit to an identical result before any differ
 * runs, so floating-point noise in re-extracted data never shows up as a
 * change. Neither input is mutated.
 */
export function compareBaselines(b1: Baseline, b2: Baseline, opts: ComparisonOptions = {}): ComparisonResult {
  assertComplete("Baseline 1", b1);
  assertComplete("Baseline 2", b2);

  const baselines = { baseline1: summarizeBaseline(b1), baseline2: summarizeBaseline(b2) };
  const diagnostics: Diagnostic[] = [];

  if (b1.checksum === b2.checksum) {
    diagnostics.push(diag("info", "IDENTICAL", "Baselines are identical (same checksum)"));
    const changes = emptyChangeSet(b1);
    const interfaces: InterfaceDiff = { added: [], removed: [], modified: [] };
    return {
      identical: true,
      baselines,
      changes,
      interfaces,
      impact: classifyImpact(changes, interfaces),
      summary: summarize(changes, interfaces),
      diagnostics,
    };
  }

  const tolerances = { ...DEFAULT_TOLERANCES, ...opts.tolerances };
  const bom = diffBom(b1.bom, b2.bom);

  const changes: ChangeSet = {
    components_added: bom.added,
    components_removed: bom.removed,
    components_modified: bom.modified,
    geometry: diffGeometry(b1, b2, tolerances.geometry_epsilon),
    topology: diffTopology(b1.geometric_properties, b2.geometric_properties, tolerances),
    metadata: diffMetadata(b1.metadata, b2.metadata),
  };

  const interfaceOpts = opts.interfaces ?? {};
  const interfaces = diffInterfaces(
    inferWithDiagnostics("Baseline 1", b1, interfaceOpts, diagnostics),
    inferWithDiagnostics("Baseline 2", b2, interfaceOpts, diagnostics),
    tolerances.interface_distance_delta,
  );

  const impact = classifyImpact(changes, interfaces);
  diagnostics.push(diag(impact.level === "none" ? "info" : "warn", "IMPACT", `${impact.level}: ${impact.message}`));

  return {
    identical: false,
    baselines,
    changes,
    interfaces,
    impact,
    summary: summarize(changes, interfaces),
    diagnostics,
  };
}
