import type { Interface, InterfaceDiff, ModifiedInterface } from "../types/interfaces.js";
import { DEFAULT_TOLERANCES } from "../config/defaults.js";
import { formatDiameter } from "../diff/format.js";

/**
 * Canonical key: sorted component names plus type. Several same-type
 * interfaces between one pair collapse onto one key (last one wins).
 */
export function interfaceKey(iface: Interface): string {
  const [a, b] = [iface.component1, iface.component2].sort();
  return `${a}||${b}||${iface.type}`;
}

function indexByKey(interfaces: readonly Interface[]): Map<string, Interface> {
  return new Map(interfaces.map((i) => [interfaceKey(i), i]));
}

function describeChanges(before: Interface, after: Interface, distanceDelta: number): string[] {
  const changes: string[] = [];
  if (before.type === "fastening" && after.type === "fastening") {
    if (before.fastener_count !== after.fastener_count) {
      changes.push(`fastener count: ${before.fastener_count} → ${after.fastener_count}`);
    }
    if (before.fastener_diameter !== after.fastener_diameter) {
      changes.push(
        `diameter: Ø${formatDiameter(before.fastener_diameter)} → Ø${formatDiameter(after.fastener_diameter)}`,
      );
    }
  } else if (before.type !== "fastening" && after.type !== "fastening") {
    if (Math.abs(before.distance - after.distance) > distanceDelta) {
      changes.push(`distance: ${before.distance.toFixed(1)} → ${after.distance.toFixed(1)}`);
    }
  }
  return changes;
}

export function diffInterfaces(
  interfaces1: readonly Interface[],
  interfaces2: readonly Interface[],
  distanceDelta: number = DEFAULT_TOLERANCES.interface_distance_delta,
): InterfaceDiff {
  const map1 = indexByKey(interfaces1);
  const map2 = indexByKey(interfaces2);

  const added: Interface[] = [];
  const removed: Interface[] = [];
  const modified: ModifiedInterface[] = [];

  for (const key of [...map1.keys()].sort()) {
    const before = map1.get(key);
    if (!before) continue;
    const after = map2.get(key);
    if (!after) {
      removed.push(before);
      continue;
    }
    const changes = describeChanges(before, after, distanceDelta);
    if (changes.length > 0) {
      modified.push({
        type: after.type,
        component1: after.component1,
        component2: after.component2,
        changes,
        change_description: changes.join("; "),
        previous: before,
        current: after,
      });
    }
  }

  for (const key of [...map2.keys()].sort()) {
    const after = map2.get(key);
    if (after && !map1.has(key)) added.push(after);
  }

  return { added, removed, modified };
}
