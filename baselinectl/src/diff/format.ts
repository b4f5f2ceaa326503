import type { Vec3 } from "../types/baseline.js";

/** Diameters always show a decimal part ("5.0", "6.35"). */
export function formatDiameter(d: number): string {
  return Number.isInteger(d) ? d.toFixed(1) : String(d);
}

/** Planar position of a hole, as "(x,y)". */
export function formatXY(x: number, y: number): string {
  return `(${x},${y})`;
}

export function formatVec(v: Vec3): string {
  return `[${v.join(", ")}]`;
}
