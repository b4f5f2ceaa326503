import { describe, expect, it } from "vitest";
import { alignHoles, classifyPair, inferInterfaces, type Located } from "../src/interfaces/inference.js";
import { ResourceBudgetError } from "../src/errors.js";
import type { Hole, Vec3 } from "../src/types/baseline.js";

function located(entry: string, name: string, center: Vec3, dims: Vec3, holes: Hole[] = []): Located {
  return {
    entry,
    props: {
      name,
      volume: 100,
      surface_area: 100,
      center_of_mass: center,
      bbox: { dims, volume_bbox: dims[0] * dims[1] * dims[2] },
      features_signature: { holes, planar_faces_count: 6 },
    },
  };
}

describe("alignHoles", () => {
  it("pairs holes of equal diameter lined up on two axes", () => {
    const matches = alignHoles([{ d: 5, x: 0, y: 0, z: 0 }], [{ d: 5, x: 1, y: 1, z: 3 }]);
    expect(matches).toEqual([{ diameter: 5, first: { x: 0, y: 0, z: 0 }, second: { x: 1, y: 1, z: 3 } }]);
  });

  it("rejects pairs too far apart in 3D even with two aligned axes", () => {
    expect(alignHoles([{ d: 5, x: 0, y: 0, z: 0 }], [{ d: 5, x: 1, y: 1, z: 10 }])).toEqual([]);
  });

  it("rejects pairs whose diameters differ beyond the tolerance", () => {
    expect(alignHoles([{ d: 5, x: 0, y: 0, z: 0 }], [{ d: 5.5, x: 0, y: 0, z: 1 }])).toEqual([]);
  });

  it("uses each hole of the second component once", () => {
    const matches = alignHoles(
      [
        { d: 5, x: 0, y: 0, z: 0 },
        { d: 5, x: 0.5, y: 0, z: 0 },
      ],
      [{ d: 5, x: 0, y: 0, z: 2 }],
    );
    expect(matches).toHaveLength(1);
    expect(matches[0].first).toEqual({ x: 0, y: 0, z: 0 });
  });
});

describe("classifyPair", () => {
  it("classifies close components without aligned holes as contact", () => {
    const a = located("0:1:1:1", "frame", [0, 0, 0], [40, 20, 10]);
    const b = located("0:1:1:2", "panel", [10, 0, 0], [20, 20, 5]);
    const iface = classifyPair(a, b);
    expect(iface).toMatchObject({ type: "contact", severity: "major", distance: 10 });
    expect(iface?.description).toBe("Contact between frame and panel (10.0 apart)");
  });

  it("classifies aligned holes as a critical fastening", () => {
    const holesA = [
      { d: 5, x: 10, y: 10, z: 0 },
      { d: 5, x: -10, y: 10, z: 0 },
    ];
    const holesB = [
      { d: 5, x: 10, y: 10, z: 3 },
      { d: 5, x: -10, y: 10, z: 3 },
    ];
    const iface = classifyPair(
      located("0:1:1:1", "base", [0, 0, 0], [40, 40, 5], holesA),
      located("0:1:1:2", "cover", [0, 0, 5], [40, 40, 5], holesB),
    );
    expect(iface?.type).toBe("fastening");
    if (iface?.type !== "fastening") return;
    expect(iface.severity).toBe("critical");
    expect(iface.fastener_count).toBe(2);
    expect(iface.fastener_diameter).toBe(5);
    expect(iface.description).toBe("2 fastener(s) Ø5.0 between base and cover");
  });

  it("reports the diameter shared by most matched holes", () => {
    const holesA = [
      { d: 4, x: 0, y: 0, z: 0 },
      { d: 6, x: 10, y: 0, z: 0 },
      { d: 6, x: 20, y: 0, z: 0 },
    ];
    const holesB = holesA.map((h) => ({ ...h, z: 3 }));
    const iface = classifyPair(
      located("0:1:1:1", "base", [0, 0, 0], [40, 40, 5], holesA),
      located("0:1:1:2", "cover", [0, 0, 5], [40, 40, 5], holesB),
    );
    expect(iface).toMatchObject({ type: "fastening", fastener_count: 3, fastener_diameter: 6 });
  });

  it("breaks a diameter tie toward the smaller fastener", () => {
    const holesA = [
      { d: 6, x: 10, y: 0, z: 0 },
      { d: 4, x: 0, y: 0, z: 0 },
    ];
    const holesB = holesA.map((h) => ({ ...h, z: 3 }));
    const iface = classifyPair(
      located("0:1:1:1", "base", [0, 0, 0], [40, 40, 5], holesA),
      located("0:1:1:2", "cover", [0, 0, 5], [40, 40, 5], holesB),
    );
    expect(iface).toMatchObject({ type: "fastening", fastener_count: 2, fastener_diameter: 4 });
  });

  it("classifies components within one extent as proximity", () => {
    const iface = classifyPair(
      located("0:1:1:1", "frame", [0, 0, 0], [40, 20, 10]),
      located("0:1:1:2", "lamp", [30, 0, 0], [5, 5, 5]),
    );
    expect(iface).toMatchObject({ type: "proximity", severity: "minor", distance: 30 });
  });

  it("returns null between one extent and the reject distance", () => {
    const iface = classifyPair(
      located("0:1:1:1", "frame", [0, 0, 0], [40, 20, 10]),
      located("0:1:1:2", "lamp", [60, 0, 0], [5, 5, 5]),
    );
    expect(iface).toBeNull();
  });

  it("rejects pairs beyond twice the largest extent even with aligned holes", () => {
    const hole = { d: 5, x: 0, y: 0, z: 0 };
    const iface = classifyPair(
      located("0:1:1:1", "frame", [0, 0, 0], [10, 10, 10], [hole]),
      located("0:1:1:2", "lamp", [25, 0, 0], [10, 10, 10], [hole]),
    );
    expect(iface).toBeNull();
  });
});

describe("inferInterfaces", () => {
  const geometry = {
    "0:1:1:3": {
      name: "panel",
      volume: 1,
      surface_area: 1,
      center_of_mass: [10, 0, 0] as const,
      bbox: { dims: [20, 20, 5] as const, volume_bbox: 2000 },
    },
    "0:1:1:2": {
      name: "frame",
      volume: 1,
      surface_area: 1,
      center_of_mass: [0, 0, 0] as const,
      bbox: { dims: [40, 20, 10] as const, volume_bbox: 8000 },
    },
    "0:1:1:4": { name: "label", volume: 1, surface_area: 1 },
  };

  it("produces exactly one classification per connected pair and skips unlocated components", () => {
    const interfaces = inferInterfaces(geometry);
    expect(interfaces).toHaveLength(1);
    expect(interfaces[0]).toMatchObject({
      type: "contact",
      component1: "frame",
      component2: "panel",
      entry1: "0:1:1:2",
      entry2: "0:1:1:3",
    });
  });

  it("refuses assemblies above the component limit", () => {
    expect(() => inferInterfaces(geometry, { max_components: 2 })).toThrow(ResourceBudgetError);
    expect(() => inferInterfaces(geometry, { max_components: 2 })).toThrow(
      "Interface inference refused: 3 components exceeds the limit of 2",
    );
  });

  it("stops when the time budget runs out", () => {
    let t = 0;
    const now = () => (t += 10);
    expect(() => inferInterfaces(geometry, { time_budget_ms: 5, now })).toThrow(
      "Interface inference exceeded its time budget of 5 ms",
    );
  });

  it("keeps severities fixed per type", () => {
    const severities = inferInterfaces(geometry).map((i) => `${i.type}:${i.severity}`);
    expect(severities).toEqual(["contact:major"]);
  });
});
