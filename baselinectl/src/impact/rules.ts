import type { ChangeSet, TopologyCategory } from "../types/changes.js";
import type { ImpactDetails, ImpactLevel, RiskSeverity } from "../types/impact.js";

export type TopologyBucket = "clash_risks" | "assembly_risks" | "retrofit_risks";

/** Risk bucket and severity for each tagged topology message. */
export const TOPOLOGY_RISK_RULES: Record<TopologyCategory, { bucket: TopologyBucket; severity: RiskSeverity }> = {
  envelope_changed: { bucket: "clash_risks", severity: "critical" },
  hole_deleted: { bucket: "assembly_risks", severity: "critical" },
  hole_moved: { bucket: "assembly_risks", severity: "critical" },
  hole_diameter_modified: { bucket: "retrofit_risks", severity: "major" },
  hole_added: { bucket: "retrofit_risks", severity: "major" },
};

export type ImpactRule = {
  level: ImpactLevel;
  message: string;
  matches: (details: ImpactDetails, changes: ChangeSet) => boolean;
};

/** Resolution order; the first matching rule sets the impact level. */
export const IMPACT_PRIORITY: readonly ImpactRule[] = [
  {
    level: "critical_interface",
    message: "Critical changes to assembly interfaces",
    matches: (d) => d.interface_risks.some((r) => r.severity === "critical"),
  },
  {
    level: "critical_clash",
    message: "Clash risks detected",
    matches: (d) => d.clash_risks.length > 0,
  },
  {
    level: "critical_assembly",
    message: "Assembly problems detected",
    matches: (d) => d.assembly_risks.length > 0,
  },
  {
    level: "critical_missing",
    message: "Components missing",
    matches: (_d, c) => c.components_removed.length > 0,
  },
  {
    level: "major_retrofit",
    message: "Major functional changes",
    matches: (d) => d.retrofit_risks.length > 0,
  },
  {
    level: "major_bom",
    message: "Significant BOM additions",
    matches: (_d, c) => c.components_added.length > 0,
  },
  {
    level: "minor_geometry",
    message: "Minor geometric changes",
    matches: (_d, c) => c.topology.length > 0,
  },
];

export const NO_IMPACT = { level: "none", message: "No significant change" } as const;
