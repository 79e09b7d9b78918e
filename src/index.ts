export { FilterReactorModal } from "@/components/modals/FilterReactorModal";
export {
  CommitEngine,
  type CommitEngineDeps,
  type CommitFailure,
  type CommitFailureKind,
  type CommitMode,
  type CommitPhase,
  type CommitResult,
  type CommitSnapshot,
} from "@/lib/commitEngine";
export {
  applyForcedValues,
  effectiveRadius,
  resolveConstraints,
  toConstructionRequest,
} from "@/lib/constraints";
export {
  CollisionError,
  ConstraintError,
  ConstructionError,
  IncompatibilityError,
  ReactorError,
  ReservedIOError,
  SelectionError,
  describeError,
} from "@/lib/errors";
export { createLogger, silentLogger, type Logger } from "@/lib/logger";
export { toastNotifier, type Notifier } from "@/lib/notifier";
export {
  BOTTOM_TYPES,
  DEFAULT_OUTPUT_NAME,
  DEFAULT_PARAMETERS,
  FIELD_LIMITS,
  TOP_TYPES,
} from "@/lib/reactorCatalog";
export { createCommitStore, type CommitStore } from "@/stores/commitStore";
export { createIORegistryStore, type IORegistryStore } from "@/stores/ioRegistryStore";
export { createParameterStore, type ParameterStore } from "@/stores/parameterStore";
export type {
  AssemblyHost,
  ConstructionRequest,
  FilterReactorFactory,
  FilterReactorHandle,
  PlacedSideIO,
  PlacedTopInlet,
  SideIOPlacement,
  TopInletSpec,
} from "@/types/geometry";
export type * from "@/types/reactor";
