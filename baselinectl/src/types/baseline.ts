/**
 * Baseline snapshot — immutable record of an assembly's structure and
 * geometry, as emitted by the geometry extraction service and persisted as
 * `config_baseline_<id>.json`. Field names are the persisted contract.
 */
export type ComponentKind = "Assembly" | "Part";

export type Vec3 = readonly [number, number, number];

export type Product = {
  id: string;
  name: string;
  description?: string;
};

export type BaselineMetadata = {
  schema?: string;
  author?: string;
  timestamp?: string;
  description?: string;
  filename?: string;
  products?: readonly Product[];
};

export type BomItem = {
  /** Depth-first pre-order position, starting at 1. */
  position: number;
  /** Depth from root; the root assembly is level 0. */
  level: number;
  quantity: number;
  name: string;
  type: ComponentKind;
  /** Stable id of the referenced shape. */
  label_entry: string;
};

export type RegistryEntry = {
  name: string;
  type: ComponentKind;
  /** BOM positions where this component is instanced. */
  instances: readonly number[];
  parent_entry?: string;
};

export type Hole = {
  d: number;
  x: number;
  y: number;
  z: number;
};

export type BoundingEnvelope = {
  dims: Vec3;
  volume_bbox?: number;
};

export type FeatureSignature = {
  /** Sorted by (d, x, y). Absent for shapes without faces. */
  holes?: readonly Hole[];
  planar_faces_count?: number;
};

export type GeometricFeatureRecord = {
  name: string;
  /** Present only when `name` collides with another component. */
  unique_name?: string;
  path?: string;
  volume: number;
  /** Older extractions omit it; read as 0. */
  surface_area?: number;
  center_of_mass?: Vec3;
  bbox?: BoundingEnvelope;
  features_signature?: FeatureSignature;
};

export type ColorEntry = {
  name: string;
  rgb: readonly [number, number, number];
};

export type DependencyEdge = {
  entry: string;
  name: string;
};

export type GeometryMap = Readonly<Record<string, GeometricFeatureRecord>>;
export type ComponentRegistry = Readonly<Record<string, RegistryEntry>>;

export type Baseline = Readonly<{
  baseline_id: string;
  timestamp: string;
  file: string;
  checksum: string;
  metadata?: BaselineMetadata;
  bom: readonly BomItem[];
  component_registry?: ComponentRegistry;
  geometric_properties: GeometryMap;
  colors?: Readonly<Record<string, ColorEntry>>;
  dependencies?: Readonly<Record<string, readonly DependencyEdge[]>>;
}>;

/** Keys a baseline must carry before any comparison proceeds. */
export const REQUIRED_BASELINE_FIELDS = [
  "baseline_id",
  "timestamp",
  "file",
  "checksum",
  "bom",
  "geometric_properties",
] as const;
