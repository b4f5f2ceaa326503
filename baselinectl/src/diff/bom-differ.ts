import type { BomItem } from "../types/baseline.js";
import type { BomComponentRef, BomDiff, BomModification } from "../types/changes.js";

function toRef(item: BomItem): BomComponentRef {
  return { name: item.name, level: item.level, type: item.type, label_entry: item.label_entry };
}

function indexByName(bom: readonly BomItem[]): Map<string, BomItem> {
  // Later items with the same name replace earlier ones.
  return new Map(bom.map((item) => [item.name, item]));
}

/**
 * Compare two BOMs joined by display name.
 *
 * Identity here is the component *name*, not its stable id: two components
 * sharing a name are matched, and a renamed component shows up as one
 * removal plus one addition. The geometry and topology differs join by
 * stable id instead.
 */
export function diffBom(bom1: readonly BomItem[], bom2: readonly BomItem[]): BomDiff {
  const byName1 = indexByName(bom1);
  const byName2 = indexByName(bom2);

  const removed: BomComponentRef[] = [];
  const added: BomComponentRef[] = [];
  const modified: BomModification[] = [];

  for (const name of [...byName1.keys()].sort()) {
    const item1 = byName1.get(name);
    if (!item1) continue;
    const item2 = byName2.get(name);
    if (!item2) {
      removed.push(toRef(item1));
      continue;
    }

    const changes: string[] = [];
    if (item1.level !== item2.level) changes.push(`level: ${item1.level} → ${item2.level}`);
    if (item1.type !== item2.type) changes.push(`type: ${item1.type} → ${item2.type}`);

    if (changes.length > 0) {
      modified.push({
        ...toRef(item2),
        label_entry: item1.label_entry,
        previous_level: item1.level,
        previous_type: item1.type,
        changes,
      });
    }
  }

  for (const name of [...byName2.keys()].sort()) {
    const item2 = byName2.get(name);
    if (item2 && !byName1.has(name)) added.push(toRef(item2));
  }

  return { added, removed, modified };
}
