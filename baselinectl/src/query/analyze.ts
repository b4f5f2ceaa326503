import type {
  Baseline,
  BaselineMetadata,
  ColorEntry,
  ComponentRegistry,
  DependencyEdge,
  GeometricFeatureRecord,
} from "../types/baseline.js";
import type { ComplianceReport } from "../types/compliance.js";
import type { ComplianceConfig } from "../types/config.js";
import { checkCompliance } from "../compliance/checker.js";
import { extractBom, extractGeometry, type BomQueryResult, type GeometryTotals } from "./extract.js";

export type BaselineAnalysis = {
  baseline_id: string;
  file: string;
  checksum: string;
  analyzed_at: string;
  metadata: BaselineMetadata;
  bom: BomQueryResult;
  components: {
    registry: ComponentRegistry;
    total_unique: number;
    /** Sum of BOM positions over every registry entry. */
    total_instances: number;
  };
  geometry: {
    properties: Record<string, GeometricFeatureRecord>;
    totals: GeometryTotals;
  };
  colors: Readonly<Record<string, ColorEntry>>;
  dependencies: Readonly<Record<string, readonly DependencyEdge[]>>;
  validation: ComplianceReport;
};

export type AnalyzeOptions = {
  compliance?: Partial<ComplianceConfig>;
  now?: Date;
};

/**
 * One report over a single baseline: metadata, BOM, component registry,
 * geometry with totals, colors, dependency graph and compliance result.
 */
export function analyzeBaseline(baseline: Baseline, opts: AnalyzeOptions = {}): BaselineAnalysis {
  const registry = baseline.component_registry ?? {};
  const geometry = extractGeometry(baseline);

  return {
    baseline_id: baseline.baseline_id,
    file: baseline.file,
    checksum: baseline.checksum,
    analyzed_at: (opts.now ?? new Date()).toISOString(),
    metadata: baseline.metadata ?? {},
    bom: extractBom(baseline),
    components: {
      registry,
      total_unique: Object.keys(registry).length,
      total_instances: Object.values(registry).reduce((sum, entry) => sum + entry.instances.length, 0),
    },
    geometry: { properties: geometry.components, totals: geometry.totals },
    colors: baseline.colors ?? {},
    dependencies: baseline.dependencies ?? {},
    validation: checkCompliance(baseline, opts.compliance),
  };
}
