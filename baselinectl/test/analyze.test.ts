import { describe, expect, it } from "vitest";
import path from "node:path";
import { analyzeBaseline } from "../src/query/analyze.js";
import { bomToCsv } from "../src/query/extract.js";
import { loadBaseline } from "../src/baseline/loader.js";
import { bomItem, makeBaseline } from "./helpers.js";

const FIXTURES = path.resolve(import.meta.dirname, "../fixtures");
const NOW = new Date("2026-03-01T08:15:30Z");

describe("analyzeBaseline", () => {
  it("reports structure, geometry and compliance of one baseline", async () => {
    const analysis = analyzeBaseline(await loadBaseline(path.join(FIXTURES, "bracket_v1.json")), { now: NOW });

    expect(analysis.baseline_id).toBe("BL-001");
    expect(analysis.analyzed_at).toBe("2026-03-01T08:15:30.000Z");
    expect(analysis.metadata.author).toBe("test-author");
    expect(analysis.bom.total_count).toBe(4);
    expect(analysis.bom.max_depth).toBe(1);
    expect(analysis.components.total_unique).toBe(4);
    expect(analysis.components.total_instances).toBe(4);
    expect(analysis.geometry.totals).toEqual({ volume_mm3: 16150.5, surface_mm2: 7720.25, component_count: 3 });
    expect(Object.keys(analysis.colors)).toEqual(["0:1:1:2"]);
    expect(analysis.dependencies["0:1:1:1"].map((d) => d.name)).toEqual(["plate", "bracket", "bolt"]);
    expect(analysis.validation.overall_status).toBe("pass");
  });

  it("fills absent sections with empty values", () => {
    const analysis = analyzeBaseline(makeBaseline({ metadata: undefined }), { now: NOW });

    expect(analysis.metadata).toEqual({});
    expect(analysis.components).toEqual({ registry: {}, total_unique: 0, total_instances: 0 });
    expect(analysis.geometry).toEqual({
      properties: {},
      totals: { volume_mm3: 0, surface_mm2: 0, component_count: 0 },
    });
    expect(analysis.colors).toEqual({});
    expect(analysis.dependencies).toEqual({});
    expect(analysis.validation.overall_status).toBe("fail");
  });
});

describe("bomToCsv", () => {
  it("writes a header and one semicolon-separated row per item", () => {
    const csv = bomToCsv([bomItem(1, "bracket_assy", "0:1:1:1", 0), bomItem(2, "plate", "0:1:1:2")]);
    expect(csv).toBe("Position;Level;Quantity;Name;Type;Reference\n1;0;1;bracket_assy;Assembly;0:1:1:1\n2;1;1;plate;Part;0:1:1:2\n");
  });

  it("quotes names holding separators or quotes", () => {
    const csv = bomToCsv([bomItem(1, 'bolt; M6 "long"', "0:1:1:4")]);
    expect(csv.split("\n")[1]).toBe('1;1;1;"bolt; M6 ""long""";Part;0:1:1:4');
  });
});
