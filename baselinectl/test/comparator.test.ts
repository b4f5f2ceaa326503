import { describe, expect, it } from "vitest";
import path from "node:path";
import { compareBaselines, missingBaselineFields } from "../src/compare/comparator.js";
import { loadBaseline } from "../src/baseline/loader.js";
import { interfaceKey } from "../src/interfaces/interface-differ.js";
import { bomItem, makeBaseline, part } from "./helpers.js";

const FIXTURES = path.resolve(import.meta.dirname, "../fixtures");

describe("compareBaselines", () => {
  it("finds nothing when a baseline is compared with itself", async () => {
    const b = await loadBaseline(path.join(FIXTURES, "bracket_v1.json"));
    const result = compareBaselines(b, b);
    expect(result.identical).toBe(true);
    expect(result.impact.level).toBe("none");
    expect(result.summary.total_changes).toBe(0);
    expect(result.interfaces).toEqual({ added: [], removed: [], modified: [] });
  });

  it("finds nothing in identical content under a different checksum", async () => {
    const b = await loadBaseline(path.join(FIXTURES, "bracket_v1.json"));
    const result = compareBaselines(b, { ...b, checksum: "re-extracted" });
    expect(result.identical).toBe(false);
    expect(result.impact.level).toBe("none");
    expect(result.summary).toEqual({
      total_changes: 0,
      components_added: 0,
      components_removed: 0,
      geometry_changes: 0,
      interface_changes: 0,
    });
    expect(result.changes.components_modified).toEqual([]);
    expect(result.changes.geometry).toEqual([]);
    expect(result.changes.topology).toEqual([]);
    expect(result.changes.metadata.changes).toEqual([]);
    expect(result.interfaces).toEqual({ added: [], removed: [], modified: [] });
  });

  it("short-circuits on equal checksums whatever else differs", () => {
    const b1 = makeBaseline({ checksum: "same", bom: [bomItem(1, "panel", "0:1:1:2")] });
    const b2 = makeBaseline({
      checksum: "same",
      bom: [bomItem(1, "cover", "0:1:1:3")],
      geometric_properties: { "0:1:1:3": part("cover", { volume: 5 }) },
    });
    const result = compareBaselines(b1, b2);
    expect(result.identical).toBe(true);
    expect(result.changes.components_added).toEqual([]);
    expect(result.changes.components_removed).toEqual([]);
    expect(result.diagnostics.map((d) => d.code)).toEqual(["IDENTICAL"]);
  });

  it("ranks a removed component above an added one", () => {
    const b1 = makeBaseline({ checksum: "a", bom: [bomItem(1, "panel", "0:1:1:2")] });
    const b2 = makeBaseline({ checksum: "b", bom: [bomItem(1, "cover", "0:1:1:3")] });
    expect(compareBaselines(b1, b2).impact.level).toBe("critical_missing");
  });

  it("resolves a lost fastening to critical_interface", () => {
    const holes = [{ d: 5, x: 0, y: 0, z: 0 }];
    const geometry1 = {
      "0:1:1:2": part("base", { center: [0, 0, 0], dims: [40, 40, 5], holes }),
      "0:1:1:3": part("cover", { center: [0, 0, 5], dims: [40, 40, 5], holes }),
    };
    const geometry2 = {
      "0:1:1:2": part("base", { center: [0, 0, 0], dims: [40, 40, 5], holes }),
      "0:1:1:3": part("cover", { center: [0, 0, 5], dims: [40, 40, 5] }),
    };
    const result = compareBaselines(
      makeBaseline({ checksum: "a", geometric_properties: geometry1 }),
      makeBaseline({ checksum: "b", geometric_properties: geometry2 }),
    );
    expect(result.interfaces.removed.map(interfaceKey)).toEqual(["base||cover||fastening"]);
    expect(result.impact.level).toBe("critical_interface");
  });

  it("compares two revisions of the bracket assembly end to end", async () => {
    const b1 = await loadBaseline(path.join(FIXTURES, "bracket_v1.json"));
    const b2 = await loadBaseline(path.join(FIXTURES, "bracket_v2.json"));
    const result = compareBaselines(b1, b2);

    expect(result.identical).toBe(false);
    expect(result.baselines.baseline1.id).toBe("BL-001");
    expect(result.changes.components_removed.map((c) => c.name)).toEqual(["bolt"]);
    expect(result.changes.components_added.map((c) => c.name)).toEqual(["washer"]);
    expect(result.changes.topology.map((t) => t.description)).toEqual([
      "bracket: diameter modified at (90,10): 6.0 → 8.0",
    ]);
    expect(result.changes.geometry.map((g) => [g.full_path, g.volume_change, g.surface_change])).toEqual([
      ["bracket_assy->bracket", -20, 6],
    ]);

    expect(result.interfaces.removed.map(interfaceKey)).toEqual(["bolt||bracket||proximity", "bolt||plate||proximity"]);
    expect(result.interfaces.added.map(interfaceKey)).toEqual(["bracket||washer||proximity", "plate||washer||proximity"]);
    expect(result.interfaces.modified.map((m) => m.change_description)).toEqual(["fastener count: 2 → 1"]);

    expect(result.impact.level).toBe("critical_missing");
    expect(result.impact.statistics).toEqual({
      clash_risks: 0,
      assembly_risks: 0,
      retrofit_risks: 1,
      bom_changes: 2,
      interface_risks: 3,
    });
    expect(result.summary).toEqual({
      total_changes: 8,
      components_added: 1,
      components_removed: 1,
      geometry_changes: 1,
      interface_changes: 5,
    });
    expect(result.diagnostics).toEqual([
      { level: "warn", code: "IMPACT", message: "critical_missing: Components missing" },
    ]);
  });

  it("does not mutate its inputs", async () => {
    const b1 = await loadBaseline(path.join(FIXTURES, "bracket_v1.json"));
    const b2 = await loadBaseline(path.join(FIXTURES, "bracket_v2.json"));
    const before = JSON.stringify([b1, b2]);
    compareBaselines(b1, b2);
    expect(JSON.stringify([b1, b2])).toBe(before);
  });

  it("notes components left out of interface inference", () => {
    const result = compareBaselines(
      makeBaseline({ checksum: "a", geometric_properties: { "0:1:1:2": part("loose") } }),
      makeBaseline({ checksum: "b" }),
    );
    expect(result.diagnostics[0]).toEqual({
      level: "info",
      code: "INTERFACE_DATA_INCOMPLETE",
      message: "Baseline 1: 1 component(s) without envelope or center of mass skipped",
      details: { skipped: 1 },
    });
  });
});

describe("missingBaselineFields", () => {
  it("lists absent required keys in order", () => {
    expect(missingBaselineFields({ baseline_id: "x", bom: [] })).toEqual([
      "timestamp",
      "file",
      "checksum",
      "geometric_properties",
    ]);
  });
});
