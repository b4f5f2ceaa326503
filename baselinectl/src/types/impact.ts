/** Impact report — one ranked level plus categorized risks. */
export type ImpactLevel =
  | "critical_interface"
  | "critical_clash"
  | "critical_assembly"
  | "critical_missing"
  | "major_retrofit"
  | "major_bom"
  | "minor_geometry"
  | "none";

export type RiskSeverity = "critical" | "major" | "minor";

export type TopologyRisk = {
  component: string;
  entry: string;
  issue: string;
  severity: RiskSeverity;
};

export type BomRisk = {
  type: "added" | "removed";
  component: string;
  severity: RiskSeverity;
};

export type InterfaceRisk = {
  type: "removed_fastening" | "removed_interface" | "modified_interface";
  components: string;
  issue: string;
  severity: RiskSeverity;
};

export type ImpactDetails = {
  clash_risks: TopologyRisk[];
  assembly_risks: TopologyRisk[];
  retrofit_risks: TopologyRisk[];
  bom_changes: BomRisk[];
  interface_risks: InterfaceRisk[];
};

export type ImpactReport = {
  level: ImpactLevel;
  message: string;
  details: ImpactDetails;
  statistics: Record<keyof ImpactDetails, number>;
};
