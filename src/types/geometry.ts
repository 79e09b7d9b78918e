import type {
  AlignFilterStrategy,
  AlignTopStrategy,
  BottomType,
  TopInletType,
  TopType,
} from "@/types/reactor";

/** Arguments of a single construction call. */
export interface ConstructionRequest {
  volume: number;
  typeTop: TopType;
  typeBottom: BottomType;
  filterDiameter: number;
  filterHeight: number;
  pipeDiameter: number;
  /** Present only when the radius is constrained by the user. */
  radius?: number;
  alignTopStrategy: AlignTopStrategy;
  alignFilterStrategy: AlignFilterStrategy;
}

/** Side I/O as attached to a module. */
export interface PlacedSideIO {
  angle: number;
  diameter: number;
  external: boolean;
  connected: boolean;
}

export interface SideIOPlacement {
  heightFraction: number;
  angle: number;
  diameter: number;
  external: boolean;
}

export interface TopInletSpec {
  type: TopInletType;
  /** Omitted for luer inlets. */
  diameter?: number;
  length?: number;
  walls?: number;
}

export interface PlacedTopInlet extends TopInletSpec {
  connected: boolean;
}

/**
 * A filter reactor module built by the geometry collaborator.
 *
 * Assigning `radius` also constrains it. Assigning a threaded `typeTop`
 * forces `radiusConstrained` and recomputes `radius` from the thread.
 * The `add*` methods replace an existing I/O of the same name.
 */
export interface FilterReactorHandle {
  volume: number;
  typeTop: TopType;
  typeBottom: BottomType;
  filterHeight: number;
  filterDiameter: number;
  pipeDiameter: number;
  radius: number;
  radiusConstrained: boolean;
  alignTopStrategy: AlignTopStrategy;
  alignFilterStrategy: AlignFilterStrategy;

  readonly inputs: ReadonlyMap<string, PlacedSideIO>;
  readonly outputs: ReadonlyMap<string, PlacedSideIO>;
  readonly topInlets: ReadonlyMap<string, PlacedTopInlet>;

  /** Height of a side I/O as a fraction of the module height. */
  getHeightFraction(io: PlacedSideIO): number;

  addInput(name: string, placement: SideIOPlacement): void;
  addOutput(name: string, placement: SideIOPlacement): void;
  /** @throws IncompatibilityError when the top takes no custom inlets. */
  addTopInlet(name: string, spec: TopInletSpec): void;
  removeInput(name: string): void;
  removeOutput(name: string): void;
  removeTopInlet(name: string): void;

  /**
   * @throws IncompatibilityError when the top takes no custom inlets.
   * @throws ConstraintError when the inlets cannot be placed without overlap.
   */
  autoPlaceTopInlets(): void;
}

export interface FilterReactorFactory {
  /** @throws ConstructionError */
  construct(request: ConstructionRequest): FilterReactorHandle;
  /** Checks a request without building geometry, when supported. */
  validate?(request: ConstructionRequest): void;
}

/** The assembly that owns the modules. */
export interface AssemblyHost {
  buildModule(handle: FilterReactorHandle): void;
  deleteModule(handle: FilterReactorHandle): void;
  refresh(): void;
}
