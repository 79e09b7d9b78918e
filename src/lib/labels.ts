/**
 * Display labels for the canonical enum values. Labels are only used at the
 * UI boundary; everything else works with the values themselves.
 */
import type {
  AlignFilterStrategy,
  AlignTopStrategy,
  BottomType,
  ParameterField,
  TopInletType,
  TopType,
} from "@/types/reactor";

export const FIELD_LABELS: Record<ParameterField, string> = {
  volume: "Reaction volume",
  typeTop: "Top type",
  typeBottom: "Bottom type",
  filterHeight: "Filter thickness",
  filterDiameter: "Filter diameter",
  pipeDiameter: "Diameter internal pipe",
  radius: "Reactor radius",
  radiusConstrained: "Radius constrained",
  alignTopStrategy: "Align top strategy",
  alignFilterStrategy: "Align filter strategy",
};

export const TOP_TYPE_LABELS: Record<TopType, string> = {
  flat: "Flat",
  round: "Round",
  custom_inlets: "Custom inlets",
  thread_gl18: "GL18 thread",
  thread_gl25: "GL25 thread",
  thread_gl45: "GL45 thread",
};

export const BOTTOM_TYPE_LABELS: Record<BottomType, string> = {
  flat: "Flat",
  conical: "Conical",
  funnel: "Funnel",
};

export const ALIGN_TOP_STRATEGY_LABELS: Record<AlignTopStrategy, string> = {
  expand: "Expand body",
  lift: "Lift reactor",
};

export const ALIGN_FILTER_STRATEGY_LABELS: Record<AlignFilterStrategy, string> = {
  adapt: "Adapt",
  lift: "Lift reactor",
};

export const SIDE_IO_LABELS: Record<"input" | "output", string> = {
  input: "Side input",
  output: "Side output",
};

export const DEFAULT_OUTPUT_LABEL = "Default output";

export const TOP_INLET_LABELS: Record<TopInletType, string> = {
  custom: "Custom top inlet",
  luer: "Luer top inlet",
};

export function connectionLabel(connected: boolean): string {
  return connected ? "Connected" : "Not connected";
}

/** Reverse lookup of a label map; `undefined` when the label is unknown. */
export function fromLabel<T extends string>(
  values: readonly T[],
  labels: Record<T, string>,
  label: string,
): T | undefined {
  return values.find((value) => labels[value] === label);
}
