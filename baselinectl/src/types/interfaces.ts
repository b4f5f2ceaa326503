/** Inferred mechanical interfaces between two components of one baseline. */
export type InterfaceType = "fastening" | "contact" | "proximity";

export type InterfaceSeverity = "critical" | "major" | "minor";

export type Point3 = { x: number; y: number; z: number };

export type MatchedHolePair = {
  diameter: number;
  first: Point3;
  second: Point3;
};

type InterfaceBase = {
  component1: string;
  component2: string;
  entry1: string;
  entry2: string;
  description: string;
};

export type FasteningInterface = InterfaceBase & {
  type: "fastening";
  severity: "critical";
  fastener_count: number;
  fastener_diameter: number;
  matched_positions: MatchedHolePair[];
};

export type ContactInterface = InterfaceBase & {
  type: "contact";
  severity: "major";
  distance: number;
};

export type ProximityInterface = InterfaceBase & {
  type: "proximity";
  severity: "minor";
  distance: number;
};

export type Interface = FasteningInterface | ContactInterface | ProximityInterface;

export type AssemblyLink = {
  connected_to: string;
  type: InterfaceType;
  severity: InterfaceSeverity;
};

export type Recommendation = {
  level: "warn" | "info";
  code:
    | "NO_FASTENING"
    | "FEW_FASTENINGS"
    | "CRITICAL_COMPONENTS"
    | "UNFASTENED_COMPONENTS"
    | "FASTENER_VARIETY"
    | "CONSISTENT";
  message: string;
  components?: string[];
};

export type InterfaceAnalysis = {
  interfaces: Interface[];
  summary: {
    total_interfaces: number;
    by_type: Record<InterfaceType, number>;
    by_severity: Record<InterfaceSeverity, number>;
  };
  critical_joints: FasteningInterface[];
  assembly_graph: Record<string, AssemblyLink[]>;
  recommendations: Recommendation[];
};

export type ModifiedInterface = {
  type: InterfaceType;
  component1: string;
  component2: string;
  changes: string[];
  change_description: string;
  previous: Interface;
  current: Interface;
};

export type InterfaceDiff = {
  added: Interface[];
  removed: Interface[];
  modified: ModifiedInterface[];
};
