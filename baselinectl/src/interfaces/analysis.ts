import type {
  AssemblyLink,
  FasteningInterface,
  Interface,
  InterfaceAnalysis,
  Recommendation,
} from "../types/interfaces.js";

/** Fastening count at which a component is flagged as structurally critical. */
const CRITICAL_FASTENINGS = 3;
/** Fewer fastening interfaces than this draws a rigidity warning. */
const MIN_FASTENINGS = 3;
const MAX_UNFASTENED_WARN = 5;
const MAX_FASTENER_DIAMETERS = 3;
const LISTED_COMPONENTS = 3;

function isFastening(iface: Interface): iface is FasteningInterface {
  return iface.type === "fastening";
}

function count(items: readonly Interface[], predicate: (i: Interface) => boolean): number {
  return items.filter(predicate).length;
}

/** Each component → every component it touches, in both directions. */
export function buildAssemblyGraph(interfaces: readonly Interface[]): Record<string, AssemblyLink[]> {
  return interfaces.reduce<Record<string, AssemblyLink[]>>((graph, iface) => {
    const link = (from: string, to: string) => {
      (graph[from] ??= []).push({ connected_to: to, type: iface.type, severity: iface.severity });
    };
    link(iface.component1, iface.component2);
    link(iface.component2, iface.component1);
    return graph;
  }, {});
}

export function recommend(interfaces: readonly Interface[]): Recommendation[] {
  const recommendations: Recommendation[] = [];
  const fastenings = interfaces.filter(isFastening);

  if (fastenings.length === 0) {
    recommendations.push({
      level: "warn",
      code: "NO_FASTENING",
      message: "No fastening detected. Check that the assembly is properly constrained.",
    });
  } else if (fastenings.length < MIN_FASTENINGS) {
    recommendations.push({
      level: "warn",
      code: "FEW_FASTENINGS",
      message: `Only ${fastenings.length} fastening interface(s). Consider adding fastening points for rigidity.`,
    });
  }

  const perComponent = fastenings.reduce((acc, f) => {
    acc.set(f.component1, (acc.get(f.component1) ?? 0) + 1);
    acc.set(f.component2, (acc.get(f.component2) ?? 0) + 1);
    return acc;
  }, new Map<string, number>());

  const critical = [...perComponent].filter(([, n]) => n >= CRITICAL_FASTENINGS).map(([name]) => name).sort();
  if (critical.length > 0) {
    recommendations.push({
      level: "warn",
      code: "CRITICAL_COMPONENTS",
      message: `Structurally critical components (≥${CRITICAL_FASTENINGS} fastenings): ${critical.slice(0, LISTED_COMPONENTS).join(", ")}`,
      components: critical,
    });
  }

  const involved = new Set(interfaces.flatMap((i) => [i.component1, i.component2]));
  const unfastened = [...involved].filter((name) => !perComponent.has(name)).sort();
  if (unfastened.length > 0 && unfastened.length <= MAX_UNFASTENED_WARN) {
    recommendations.push({
      level: "warn",
      code: "UNFASTENED_COMPONENTS",
      message: `Components without a direct fastening: ${unfastened.slice(0, LISTED_COMPONENTS).join(", ")}`,
      components: unfastened,
    });
  }

  const diameters = new Set(fastenings.map((f) => f.fastener_diameter));
  if (diameters.size > MAX_FASTENER_DIAMETERS) {
    recommendations.push({
      level: "info",
      code: "FASTENER_VARIETY",
      message: `${diameters.size} different fastener diameters in use. Consider standardizing to reduce variety.`,
    });
  }

  if (recommendations.length === 0) {
    recommendations.push({ level: "info", code: "CONSISTENT", message: "Assembly configuration is consistent." });
  }

  return recommendations;
}

/** Summaries derived from one baseline's inferred interfaces. */
export function analyzeInterfaces(interfaces: Interface[]): InterfaceAnalysis {
  return {
    interfaces,
    summary: {
      total_interfaces: interfaces.length,
      by_type: {
        fastening: count(interfaces, (i) => i.type === "fastening"),
        contact: count(interfaces, (i) => i.type === "contact"),
        proximity: count(interfaces, (i) => i.type === "proximity"),
      },
      by_severity: {
        critical: count(interfaces, (i) => i.severity === "critical"),
        major: count(interfaces, (i) => i.severity === "major"),
        minor: count(interfaces, (i) => i.severity === "minor"),
      },
    },
    critical_joints: interfaces.filter(isFastening),
    assembly_graph: buildAssemblyGraph(interfaces),
    recommendations: recommend(interfaces),
  };
}
