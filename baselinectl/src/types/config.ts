/** Configuration types — layered config system (base.yaml ← env.yaml ← BASELINECTL_* vars). */
export type TolerancesConfig = {
  /** Absolute volume/surface delta below which geometry is unchanged. */
  geometry_epsilon: number;
  /** Per-axis bounding extent tolerance. */
  envelope: number;
  /** 3D distance under which a removed/added hole pair is the same position. */
  hole_position: number;
  /** Diameter agreement tolerance for moved holes. */
  hole_diameter: number;
  /** Contact/proximity distance delta reported as a modification. */
  interface_distance_delta: number;
};

export type InterfacesConfig = {
  reject_ratio: number;
  contact_ratio: number;
  proximity_ratio: number;
  axis_tolerance: number;
  diameter_tolerance: number;
  max_components: number;
  time_budget_ms?: number;
};

export type ComplianceConfig = {
  valid_schemas: string[];
  max_depth: number;
};

export type BaselineCtlConfig = {
  schema_version: string;
  report_dir: string;
  extractor_command?: string;
  extractor_args?: string[];
  tolerances: TolerancesConfig;
  interfaces: InterfacesConfig;
  compliance: ComplianceConfig;
};
