import type { GeometryMap, Hole, Vec3 } from "../types/baseline.js";
import type { TopologyDiff, TopologyMessage } from "../types/changes.js";
import { DEFAULT_TOLERANCES } from "../config/defaults.js";
import { formatDiameter, formatVec, formatXY } from "./format.js";

export type TopologyOptions = {
  envelope?: number;
  hole_position?: number;
  hole_diameter?: number;
};

export type HoleReconciliation = {
  removed: Hole[];
  added: Hole[];
  unchanged: Hole[];
  messages: TopologyMessage[];
};

/** Hole messages beyond this count are collapsed in the human-readable summary. */
const SUMMARY_LIMIT = 10;
const SUMMARY_PREVIEW = 5;

const NO_DIMS: Vec3 = [0, 0, 0];

function holeKey(h: Hole): string {
  return `${h.x}|${h.y}|${h.z}|${h.d}`;
}

/** Canonical iteration order: diameter, then x, then y (z breaks remaining ties). */
export function compareHoles(a: Hole, b: Hole): number {
  return a.d - b.d || a.x - b.x || a.y - b.y || a.z - b.z;
}

function toHoleSet(holes: readonly Hole[]): Map<string, Hole> {
  const set = new Map<string, Hole>();
  for (const h of holes) {
    const key = holeKey(h);
    if (!set.has(key)) set.set(key, { d: h.d, x: h.x, y: h.y, z: h.z });
  }
  return set;
}

function distance3(a: Hole, b: Hole): number {
  return Math.hypot(a.x - b.x, a.y - b.y, a.z - b.z);
}

function position(h: Hole): Vec3 {
  return [h.x, h.y, h.z];
}

/**
 * Reconcile two hole signatures into modified / moved / deleted / created
 * messages.
 *
 * Greedy, first-match assignment: removed holes are visited in canonical
 * order and each consumes the first remaining added hole that is either at
 * the same position (diameter modified) or of the same diameter (moved).
 * Ties go to the first candidate, not to the cheapest overall matching.
 */
export function reconcileHoles(
  holes1: readonly Hole[],
  holes2: readonly Hole[],
  opts: TopologyOptions = {},
): HoleReconciliation {
  const positionTol = opts.hole_position ?? DEFAULT_TOLERANCES.hole_position;
  const diameterTol = opts.hole_diameter ?? DEFAULT_TOLERANCES.hole_diameter;

  const set1 = toHoleSet(holes1);
  const set2 = toHoleSet(holes2);

  const removed = [...set1].filter(([k]) => !set2.has(k)).map(([, h]) => h).sort(compareHoles);
  const added = [...set2].filter(([k]) => !set1.has(k)).map(([, h]) => h).sort(compareHoles);
  const unchanged = [...set1].filter(([k]) => set2.has(k)).map(([, h]) => h).sort(compareHoles);

  const messages: TopologyMessage[] = [];
  const pending = [...added];

  for (const r of removed) {
    const samePos = pending.findIndex((a) => distance3(r, a) < positionTol);
    if (samePos !== -1) {
      const [a] = pending.splice(samePos, 1);
      messages.push({
        category: "hole_diameter_modified",
        text: `diameter modified at ${formatXY(r.x, r.y)}: ${formatDiameter(r.d)} → ${formatDiameter(a.d)}`,
        position: position(r),
        before: r.d,
        after: a.d,
      });
      continue;
    }

    const sameDiameter = pending.findIndex((a) => Math.abs(a.d - r.d) <= diameterTol);
    if (sameDiameter !== -1) {
      const [a] = pending.splice(sameDiameter, 1);
      messages.push({
        category: "hole_moved",
        text: `moved: diameter ${formatDiameter(r.d)}, new position ${formatXY(a.x, a.y)}`,
        diameter: r.d,
        from: position(r),
        to: position(a),
      });
      continue;
    }

    messages.push({
      category: "hole_deleted",
      text: `deleted: diameter ${formatDiameter(r.d)} at ${formatXY(r.x, r.y)}`,
      diameter: r.d,
      position: position(r),
    });
  }

  for (const a of pending) {
    messages.push({
      category: "hole_added",
      text: `created: diameter ${formatDiameter(a.d)} at ${formatXY(a.x, a.y)}`,
      diameter: a.d,
      position: position(a),
    });
  }

  return { removed, added, unchanged, messages };
}

/** Returns an envelope message when any axis moved beyond the tolerance. */
export function compareEnvelope(
  dims1: Vec3,
  dims2: Vec3,
  tolerance: number = DEFAULT_TOLERANCES.envelope,
): TopologyMessage | null {
  const changed = dims1.some((v, i) => Math.abs(v - dims2[i]) > tolerance);
  if (!changed) return null;
  return {
    category: "envelope_changed",
    text: `envelope changed: ${formatVec(dims1)} → ${formatVec(dims2)}`,
    before: dims1,
    after: dims2,
  };
}

/** Collapse a long hole message list into one summary line. */
export function summarizeHoleMessages(messages: readonly TopologyMessage[]): string {
  const texts = messages.map((m) => m.text);
  if (texts.length > SUMMARY_LIMIT) {
    const preview = texts.slice(0, SUMMARY_PREVIEW).join(" | ");
    return `${preview} ... (+${texts.length - SUMMARY_PREVIEW} more)`;
  }
  return texts.join(" | ");
}

/**
 * Compare bounding envelopes and hole signatures of every component present
 * in both geometry maps (joined by stable id).
 */
export function diffTopology(
  geom1: GeometryMap,
  geom2: GeometryMap,
  opts: TopologyOptions = {},
): TopologyDiff[] {
  const result: TopologyDiff[] = [];
  const shared = Object.keys(geom1).filter((entry) => Object.hasOwn(geom2, entry)).sort();

  for (const entry of shared) {
    const props1 = geom1[entry];
    const props2 = geom2[entry];
    const messages: TopologyMessage[] = [];
    const differences: string[] = [];

    const envelope = compareEnvelope(
      props1.bbox?.dims ?? NO_DIMS,
      props2.bbox?.dims ?? NO_DIMS,
      opts.envelope,
    );
    if (envelope) {
      messages.push(envelope);
      differences.push(envelope.text);
    }

    const holes = reconcileHoles(
      props1.features_signature?.holes ?? [],
      props2.features_signature?.holes ?? [],
      opts,
    );
    if (holes.messages.length > 0) {
      messages.push(...holes.messages);
      differences.push(summarizeHoleMessages(holes.messages));
    }

    if (messages.length > 0) {
      result.push({
        component: props1.name,
        entry,
        messages,
        differences,
        description: `${props1.name}: ${differences.join(" | ")}`,
      });
    }
  }

  return result;
}
