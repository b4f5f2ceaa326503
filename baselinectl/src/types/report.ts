import type { ChangeSet } from "./changes.js";
import type { ImpactLevel, ImpactReport } from "./impact.js";
import type { InterfaceDiff } from "./interfaces.js";

/** Persisted comparison report (schemas/comparison-report.schema.json). */
export type ComparisonReport = {
  baseline1: string;
  baseline2: string;
  comparison_date: string;
  identical: boolean;
  impact_assessment: ImpactLevel;
  summary: {
    total_changes: number;
    components_added: number;
    components_removed: number;
    geometry_changes: number;
    interface_changes: number;
  };
  impact: ImpactReport;
  changes: ChangeSet;
  interfaces: InterfaceDiff;
};
