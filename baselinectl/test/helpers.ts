import type { Baseline, BomItem, GeometricFeatureRecord, Hole, Vec3 } from "../src/types/baseline.js";

type PartOpts = {
  volume?: number;
  surface?: number;
  center?: Vec3;
  dims?: Vec3;
  holes?: Hole[];
};

export function part(name: string, opts: PartOpts = {}): GeometricFeatureRecord {
  const record: GeometricFeatureRecord = {
    name,
    volume: opts.volume ?? 1000,
    surface_area: opts.surface ?? 600,
  };
  return {
    ...record,
    ...(opts.center ? { center_of_mass: opts.center } : {}),
    ...(opts.dims ? { bbox: { dims: opts.dims, volume_bbox: opts.dims[0] * opts.dims[1] * opts.dims[2] } } : {}),
    ...(opts.holes ? { features_signature: { holes: opts.holes, planar_faces_count: 6 } } : {}),
  };
}

export function bomItem(position: number, name: string, labelEntry: string, level = 1): BomItem {
  return { position, level, quantity: 1, name, type: level === 0 ? "Assembly" : "Part", label_entry: labelEntry };
}

export function makeBaseline(overrides: Partial<Baseline> = {}): Baseline {
  return {
    baseline_id: "BL-TEST",
    timestamp: "2026-01-01T00:00:00",
    file: "test.stp",
    checksum: "checksum-1",
    metadata: { schema: "AP214", products: [] },
    bom: [],
    geometric_properties: {},
    ...overrides,
  };
}
