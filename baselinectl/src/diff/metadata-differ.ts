import type { BaselineMetadata } from "../types/baseline.js";
import type { MetadataDiff } from "../types/changes.js";

export function diffMetadata(
  meta1: BaselineMetadata | undefined,
  meta2: BaselineMetadata | undefined,
): MetadataDiff {
  const schemaBefore = meta1?.schema ?? "";
  const schemaAfter = meta2?.schema ?? "";
  const names1 = new Set((meta1?.products ?? []).map((p) => p.name));
  const names2 = new Set((meta2?.products ?? []).map((p) => p.name));

  const productsAdded = [...names2].filter((n) => !names1.has(n)).sort();
  const productsRemoved = [...names1].filter((n) => !names2.has(n)).sort();

  const changes: string[] = [];
  if (schemaBefore !== schemaAfter) changes.push(`schema: ${schemaBefore} → ${schemaAfter}`);
  if (productsAdded.length > 0) changes.push(`products added: ${productsAdded.join(", ")}`);
  if (productsRemoved.length > 0) changes.push(`products removed: ${productsRemoved.join(", ")}`);

  return {
    schema_changed: schemaBefore !== schemaAfter,
    schema_before: schemaBefore,
    schema_after: schemaAfter,
    products_added: productsAdded,
    products_removed: productsRemoved,
    changes,
  };
}
