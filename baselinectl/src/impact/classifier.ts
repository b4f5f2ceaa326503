import type { ChangeSet } from "../types/changes.js";
import type { InterfaceDiff } from "../types/interfaces.js";
import type { ImpactDetails, ImpactReport, InterfaceRisk } from "../types/impact.js";
import { IMPACT_PRIORITY, NO_IMPACT, TOPOLOGY_RISK_RULES } from "./rules.js";
import { formatDiameter } from "../diff/format.js";

function pair(a: string, b: string): string {
  return `${a} ↔ ${b}`;
}

function interfaceRisks(diff: InterfaceDiff): InterfaceRisk[] {
  const risks: InterfaceRisk[] = [];

  for (const iface of diff.removed) {
    if (iface.type === "fastening") {
      risks.push({
        type: "removed_fastening",
        components: pair(iface.component1, iface.component2),
        issue: `Fastening removed (${iface.fastener_count} fastener(s) Ø${formatDiameter(iface.fastener_diameter)})`,
        severity: "critical",
      });
    } else {
      risks.push({
        type: "removed_interface",
        components: pair(iface.component1, iface.component2),
        issue: `${iface.type} interface removed`,
        severity: "major",
      });
    }
  }

  for (const mod of diff.modified) {
    risks.push({
      type: "modified_interface",
      components: pair(mod.component1, mod.component2),
      issue: mod.change_description,
      severity: mod.type === "fastening" ? "major" : "minor",
    });
  }

  return risks;
}

/**
 * Classify a change set into risk buckets and resolve one impact level.
 *
 * Topology risks come from the category tag on each message. The level is
 * the first rule of IMPACT_PRIORITY that matches, else "none".
 */
export function classifyImpact(changes: ChangeSet, interfaceDiff: InterfaceDiff): ImpactReport {
  const details: ImpactDetails = {
    clash_risks: [],
    assembly_risks: [],
    retrofit_risks: [],
    bom_changes: [],
    interface_risks: interfaceRisks(interfaceDiff),
  };

  for (const diff of changes.topology) {
    for (const msg of diff.messages) {
      const rule = TOPOLOGY_RISK_RULES[msg.category];
      details[rule.bucket].push({
        component: diff.component,
        entry: diff.entry,
        issue: msg.text,
        severity: rule.severity,
      });
    }
  }

  for (const comp of changes.components_removed) {
    details.bom_changes.push({ type: "removed", component: comp.name, severity: "critical" });
  }
  for (const comp of changes.components_added) {
    details.bom_changes.push({ type: "added", component: comp.name, severity: "major" });
  }

  const resolved = IMPACT_PRIORITY.find((rule) => rule.matches(details, changes)) ?? NO_IMPACT;

  return {
    level: resolved.level,
    message: resolved.message,
    details,
    statistics: {
      clash_risks: details.clash_risks.length,
      assembly_risks: details.assembly_risks.length,
      retrofit_risks: details.retrofit_risks.length,
      bom_changes: details.bom_changes.length,
      interface_risks: details.interface_risks.length,
    },
  };
}
