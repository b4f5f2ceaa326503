import { minimatch } from "minimatch";
import type { Baseline, BomItem, GeometricFeatureRecord } from "../types/baseline.js";
import { ComponentNotFoundError } from "../errors.js";

const MAX_SUGGESTIONS = 10;

export type GeometryTotals = {
  volume_mm3: number;
  surface_mm2: number;
  component_count: number;
};

export type GeometryQueryResult = {
  components: Record<string, GeometricFeatureRecord>;
  totals: GeometryTotals;
};

export type BomQueryResult = {
  items: BomItem[];
  total_count: number;
  max_depth: number;
};

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function matches(props: GeometricFeatureRecord, query: string): boolean {
  const candidates = [props.name, props.unique_name, props.path].filter((v): v is string => v !== undefined);
  return candidates.some((c) => c === query || minimatch(c, query));
}

/** Sorted display names, plus unique names where they differ from the simple name. */
function availableNames(records: readonly GeometricFeatureRecord[]): string[] {
  const names = new Set<string>();
  for (const props of records) {
    names.add(props.name);
    if (props.unique_name !== undefined && props.unique_name !== props.name) names.add(props.unique_name);
  }
  return [...names].sort();
}

function totalsOf(records: readonly GeometricFeatureRecord[]): GeometryTotals {
  return {
    volume_mm3: round2(records.reduce((sum, p) => sum + p.volume, 0)),
    surface_mm2: round2(records.reduce((sum, p) => sum + (p.surface_area ?? 0), 0)),
    component_count: records.length,
  };
}

/**
 * Geometric properties of the whole baseline, or of the components whose
 * name, unique name or path equals (or glob-matches) `component`.
 */
export function extractGeometry(baseline: Baseline, component?: string): GeometryQueryResult {
  const all = baseline.geometric_properties;
  if (component === undefined) {
    return { components: { ...all }, totals: totalsOf(Object.values(all)) };
  }

  const selected = Object.fromEntries(Object.entries(all).filter(([, props]) => matches(props, component)));
  const records = Object.values(selected);
  if (records.length === 0) {
    const names = availableNames(Object.values(all));
    throw new ComponentNotFoundError(
      component,
      names.slice(0, MAX_SUGGESTIONS),
      Math.max(0, names.length - MAX_SUGGESTIONS),
    );
  }

  return { components: selected, totals: totalsOf(records) };
}

export function extractBom(baseline: Baseline): BomQueryResult {
  const items = [...baseline.bom];
  return {
    items,
    total_count: items.length,
    max_depth: items.reduce((depth, item) => Math.max(depth, item.level), 0),
  };
}

const CSV_HEADER = ["Position", "Level", "Quantity", "Name", "Type", "Reference"];

function csvField(value: string | number): string {
  const text = String(value);
  return /[;"\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** Semicolon-separated BOM export, one row per item after a header row. */
export function bomToCsv(items: readonly BomItem[]): string {
  const rows: (string | number)[][] = [
    CSV_HEADER,
    ...items.map((item) => [item.position, item.level, item.quantity, item.name, item.type, item.label_entry]),
  ];
  return rows.map((row) => row.map(csvField).join(";")).join("\n") + "\n";
}
