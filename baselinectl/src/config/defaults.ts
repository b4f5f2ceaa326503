import type { BaselineCtlConfig, ComplianceConfig, InterfacesConfig, TolerancesConfig } from "../types/config.js";

export const DEFAULT_TOLERANCES: TolerancesConfig = {
  geometry_epsilon: 0.01,
  envelope: 0.1,
  hole_position: 0.5,
  hole_diameter: 0.1,
  interface_distance_delta: 1.0,
};

export const DEFAULT_INTERFACES: InterfacesConfig = {
  reject_ratio: 2,
  contact_ratio: 0.3,
  proximity_ratio: 1,
  axis_tolerance: 2,
  diameter_tolerance: 0.1,
  max_components: 500,
};

export const DEFAULT_COMPLIANCE: ComplianceConfig = {
  valid_schemas: ["CONFIG_CONTROL_DESIGN", "AUTOMOTIVE_DESIGN", "AP203", "AP214"],
  max_depth: 10,
};

export const DEFAULT_CONFIG: BaselineCtlConfig = {
  schema_version: "1.0.0",
  report_dir: "reports",
  tolerances: DEFAULT_TOLERANCES,
  interfaces: DEFAULT_INTERFACES,
  compliance: DEFAULT_COMPLIANCE,
};
