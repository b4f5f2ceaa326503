import type { GeometricFeatureRecord, GeometryMap, Hole } from "../types/baseline.js";
import type { Interface, MatchedHolePair } from "../types/interfaces.js";
import type { InterfacesConfig } from "../types/config.js";
import { DEFAULT_INTERFACES } from "../config/defaults.js";
import { ResourceBudgetError } from "../errors.js";
import { compareHoles } from "../diff/topology-differ.js";
import { formatDiameter } from "../diff/format.js";

export type InferenceOptions = Partial<InterfacesConfig> & {
  /** Injected clock for the time budget. */
  now?: () => number;
};

export type Located = {
  entry: string;
  props: GeometricFeatureRecord & Required<Pick<GeometricFeatureRecord, "bbox" | "center_of_mass">>;
};

function isLocated(entry: string, props: GeometricFeatureRecord): Located | null {
  const { bbox, center_of_mass } = props;
  if (!bbox || !center_of_mass) return null;
  return { entry, props: { ...props, bbox, center_of_mass } };
}

/**
 * Pair holes of two components that line up as a through-fastener.
 *
 * A pair aligns when the diameters agree within `diameter_tolerance`, at
 * least two axis offsets are below `axis_tolerance`, and the 3D separation
 * is below twice that. Each hole of the first component consumes the first
 * free match on the second side.
 */
export function alignHoles(
  holes1: readonly Hole[],
  holes2: readonly Hole[],
  opts: Pick<InferenceOptions, "axis_tolerance" | "diameter_tolerance"> = {},
): MatchedHolePair[] {
  const axisTol = opts.axis_tolerance ?? DEFAULT_INTERFACES.axis_tolerance;
  const diameterTol = opts.diameter_tolerance ?? DEFAULT_INTERFACES.diameter_tolerance;

  const first = [...holes1].sort(compareHoles);
  const second = [...holes2].sort(compareHoles);
  const used = new Set<number>();
  const matches: MatchedHolePair[] = [];

  for (const h1 of first) {
    const idx = second.findIndex((h2, i) => {
      if (used.has(i)) return false;
      if (Math.abs(h1.d - h2.d) > diameterTol) return false;
      const dx = Math.abs(h1.x - h2.x);
      const dy = Math.abs(h1.y - h2.y);
      const dz = Math.abs(h1.z - h2.z);
      const alignedAxes = [dx, dy, dz].filter((v) => v < axisTol).length;
      return alignedAxes >= 2 && Math.hypot(dx, dy, dz) < axisTol * 2;
    });
    if (idx === -1) continue;

    used.add(idx);
    const h2 = second[idx];
    matches.push({
      diameter: h1.d,
      first: { x: h1.x, y: h1.y, z: h1.z },
      second: { x: h2.x, y: h2.y, z: h2.z },
    });
  }

  return matches;
}

/** Diameter with the most matches; ties go to the smallest diameter. */
function dominantDiameter(matches: readonly MatchedHolePair[]): number {
  const counts = matches.reduce((acc, m) => acc.set(m.diameter, (acc.get(m.diameter) ?? 0) + 1), new Map<number, number>());
  let best = matches[0].diameter;
  let bestCount = 0;
  for (const [diameter, count] of counts) {
    if (count > bestCount) {
      best = diameter;
      bestCount = count;
    }
  }
  return best;
}

/** Classify one component pair, or return null when nothing connects them. */
export function classifyPair(a: Located, b: Located, opts: InferenceOptions = {}): Interface | null {
  const rejectRatio = opts.reject_ratio ?? DEFAULT_INTERFACES.reject_ratio;
  const contactRatio = opts.contact_ratio ?? DEFAULT_INTERFACES.contact_ratio;
  const proximityRatio = opts.proximity_ratio ?? DEFAULT_INTERFACES.proximity_ratio;

  const [ax, ay, az] = a.props.center_of_mass;
  const [bx, by, bz] = b.props.center_of_mass;
  const distance = Math.hypot(ax - bx, ay - by, az - bz);
  const maxExtent = Math.max(...a.props.bbox.dims, ...b.props.bbox.dims);

  if (distance > rejectRatio * maxExtent) return null;

  const names = {
    component1: a.props.name,
    component2: b.props.name,
    entry1: a.entry,
    entry2: b.entry,
  };

  const matches = alignHoles(
    a.props.features_signature?.holes ?? [],
    b.props.features_signature?.holes ?? [],
    opts,
  );

  if (matches.length > 0) {
    const diameter = dominantDiameter(matches);
    return {
      ...names,
      type: "fastening",
      severity: "critical",
      fastener_count: matches.length,
      fastener_diameter: diameter,
      matched_positions: matches,
      description: `${matches.length} fastener(s) Ø${formatDiameter(diameter)} between ${a.props.name} and ${b.props.name}`,
    };
  }

  if (distance < contactRatio * maxExtent) {
    return {
      ...names,
      type: "contact",
      severity: "major",
      distance,
      description: `Contact between ${a.props.name} and ${b.props.name} (${distance.toFixed(1)} apart)`,
    };
  }

  if (distance < proximityRatio * maxExtent) {
    return {
      ...names,
      type: "proximity",
      severity: "minor",
      distance,
      description: `Proximity between ${a.props.name} and ${b.props.name} (${distance.toFixed(1)} apart)`,
    };
  }

  return null;
}

/**
 * Scan every unordered component pair of one baseline for fastening,
 * contact and proximity interfaces.
 *
 * The scan is O(n²). Assemblies above `max_components`, or scans running
 * past `time_budget_ms`, fail with ResourceBudgetError instead of returning
 * a partial list. Components without an envelope or center of mass are
 * skipped.
 */
export function inferInterfaces(geometry: GeometryMap, opts: InferenceOptions = {}): Interface[] {
  const maxComponents = opts.max_components ?? DEFAULT_INTERFACES.max_components;
  const entries = Object.keys(geometry).sort();
  if (entries.length > maxComponents) {
    throw new ResourceBudgetError(
      `Interface inference refused: ${entries.length} components exceeds the limit of ${maxComponents}`,
    );
  }

  const located = entries
    .map((entry) => isLocated(entry, geometry[entry]))
    .filter((c): c is Located => c !== null);

  const now = opts.now ?? Date.now;
  const startedAt = now();
  const interfaces: Interface[] = [];

  for (let i = 0; i < located.length; i++) {
    if (opts.time_budget_ms !== undefined && now() - startedAt > opts.time_budget_ms) {
      throw new ResourceBudgetError(`Interface inference exceeded its time budget of ${opts.time_budget_ms} ms`);
    }
    for (let j = i + 1; j < located.length; j++) {
      const iface = classifyPair(located[i], located[j], opts);
      if (iface) interfaces.push(iface);
    }
  }

  return interfaces;
}

/** Number of components that carry enough data to take part in inference. */
export function countLocated(geometry: GeometryMap): number {
  return Object.entries(geometry).filter(([entry, props]) => isLocated(entry, props) !== null).length;
}
