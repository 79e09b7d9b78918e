import type {
  ALIGN_FILTER_STRATEGIES,
  ALIGN_TOP_STRATEGIES,
  BOTTOM_TYPES,
  TOP_TYPES,
} from "@/lib/reactorCatalog";

export type TopType = (typeof TOP_TYPES)[number];
export type BottomType = (typeof BOTTOM_TYPES)[number];
export type AlignTopStrategy = (typeof ALIGN_TOP_STRATEGIES)[number];
export type AlignFilterStrategy = (typeof ALIGN_FILTER_STRATEGIES)[number];

/** Basic and advanced settings of a filter reactor module. */
export interface ModuleParameters {
  /** Reaction volume in mL. */
  volume: number;
  typeTop: TopType;
  typeBottom: BottomType;
  filterHeight: number;
  filterDiameter: number;
  /** Diameter of the internal pipe, only used by bottoms that have one. */
  pipeDiameter: number;
  radius: number | null;
  radiusConstrained: boolean;
  alignTopStrategy: AlignTopStrategy;
  alignFilterStrategy: AlignFilterStrategy;
}

export type ParameterField = keyof ModuleParameters;

/** Which fields the user may currently edit. */
export type FieldAvailability = Record<ParameterField, boolean>;

/** A side input or side output. */
export interface SideIODescriptor {
  name: string;
  /** Position along the body, 0 at the bottom and 1 at the top. */
  heightFraction: number;
  /** Degrees around the body axis. */
  angle: number;
  diameter: number;
  external: boolean;
  /** Set by the assembly when another module is attached. */
  readonly connected: boolean;
}

interface TopInletBase {
  name: string;
  readonly connected: boolean;
}

export interface CustomTopInletDescriptor extends TopInletBase {
  type: "custom";
  diameter: number;
  length: number;
  walls: number;
}

/** Luer inlets take the collaborator's default dimensions. */
export interface LuerTopInletDescriptor extends TopInletBase {
  type: "luer";
}

export type TopInletDescriptor = CustomTopInletDescriptor | LuerTopInletDescriptor;
export type TopInletType = TopInletDescriptor["type"];

export type IOKind = "input" | "output" | "topInlet";

export type IOEntry =
  | { kind: "input"; descriptor: SideIODescriptor }
  | { kind: "output"; descriptor: SideIODescriptor }
  | { kind: "topInlet"; descriptor: TopInletDescriptor };

export interface IORef {
  kind: IOKind;
  name: string;
}

/** Display row derived from a registry entry. */
export interface IORow extends IORef {
  typeLabel: string;
  connectedLabel: string;
  selectable: boolean;
}

export interface IOSnapshot {
  inputs: SideIODescriptor[];
  outputs: SideIODescriptor[];
  topInlets: TopInletDescriptor[];
}
