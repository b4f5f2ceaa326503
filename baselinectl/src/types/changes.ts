import type { ComponentKind, Vec3 } from "./baseline.js";

/** Change set types — produced fresh per comparison, never persisted back into a baseline. */
export type BomComponentRef = {
  name: string;
  level: number;
  type: ComponentKind;
  label_entry: string;
};

export type BomModification = BomComponentRef & {
  previous_level: number;
  previous_type: ComponentKind;
  /** e.g. "level: 1 → 2", "type: Part → Assembly" */
  changes: string[];
};

export type BomDiff = {
  added: BomComponentRef[];
  removed: BomComponentRef[];
  modified: BomModification[];
};

export type GeometryChange = {
  component: string;
  full_path: string;
  entry: string;
  volume_before: number;
  volume_after: number;
  volume_change: number;
  surface_before: number;
  surface_after: number;
  surface_change: number;
};

export type TopologyCategory =
  | "envelope_changed"
  | "hole_diameter_modified"
  | "hole_moved"
  | "hole_deleted"
  | "hole_added";

export type TopologyMessage =
  | { category: "envelope_changed"; text: string; before: Vec3; after: Vec3 }
  | { category: "hole_diameter_modified"; text: string; position: Vec3; before: number; after: number }
  | { category: "hole_moved"; text: string; diameter: number; from: Vec3; to: Vec3 }
  | { category: "hole_deleted"; text: string; diameter: number; position: Vec3 }
  | { category: "hole_added"; text: string; diameter: number; position: Vec3 };

export type TopologyDiff = {
  component: string;
  entry: string;
  /** Full machine-readable list, never truncated. */
  messages: TopologyMessage[];
  /** Human-readable lines; hole messages may be collapsed with a "+N more" suffix. */
  differences: string[];
  description: string;
};

export type MetadataDiff = {
  schema_changed: boolean;
  schema_before: string;
  schema_after: string;
  products_added: string[];
  products_removed: string[];
  changes: string[];
};

export type ChangeSet = {
  components_added: BomComponentRef[];
  components_removed: BomComponentRef[];
  components_modified: BomModification[];
  geometry: GeometryChange[];
  topology: TopologyDiff[];
  metadata: MetadataDiff;
};
