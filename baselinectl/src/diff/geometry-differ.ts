import type { Baseline, ComponentRegistry } from "../types/baseline.js";
import type { GeometryChange } from "../types/changes.js";
import { DEFAULT_TOLERANCES } from "../config/defaults.js";

export const PATH_SEPARATOR = "->";

/**
 * Rebuild "assembly->subassembly->part" for a component by walking
 * `parent_entry` links in the registry. Ancestors with an empty name or the
 * component's own name are skipped. Falls back to the bare name when the
 * registry has no entry for the component.
 */
export function componentPath(
  registry: ComponentRegistry | undefined,
  entry: string,
  fallbackName: string,
): string {
  const own = registry?.[entry];
  if (!registry || !own) return fallbackName;

  const name = own.name || fallbackName;
  const parts = [name];
  const visited = new Set([entry]);
  let parent = own.parent_entry;

  while (parent && !visited.has(parent)) {
    const ancestor = registry[parent];
    if (!ancestor) break;
    visited.add(parent);
    if (ancestor.name && ancestor.name !== name) parts.unshift(ancestor.name);
    parent = ancestor.parent_entry;
  }

  return parts.join(PATH_SEPARATOR);
}

/**
 * Volume / surface deltas for every component present in both baselines,
 * joined by stable id. Deltas within the epsilon are ignored.
 */
export function diffGeometry(
  b1: Baseline,
  b2: Baseline,
  epsilon: number = DEFAULT_TOLERANCES.geometry_epsilon,
): GeometryChange[] {
  const geom1 = b1.geometric_properties;
  const geom2 = b2.geometric_properties;
  const changes: GeometryChange[] = [];

  for (const entry of Object.keys(geom1).sort()) {
    if (!Object.hasOwn(geom2, entry)) continue;
    const props1 = geom1[entry];
    const props2 = geom2[entry];

    const surface1 = props1.surface_area ?? 0;
    const surface2 = props2.surface_area ?? 0;
    const volumeChange = props2.volume - props1.volume;
    const surfaceChange = surface2 - surface1;
    if (Math.abs(volumeChange) <= epsilon && Math.abs(surfaceChange) <= epsilon) continue;

    const component = b1.component_registry?.[entry]?.name || props1.name;
    changes.push({
      component,
      full_path: componentPath(b1.component_registry, entry, props1.name),
      entry,
      volume_before: props1.volume,
      volume_after: props2.volume,
      volume_change: volumeChange,
      surface_before: surface1,
      surface_after: surface2,
      surface_change: surfaceChange,
    });
  }

  return changes;
}
