/**
 * Filter reactor catalog: supported top and bottom styles, default values
 * and the bounds accepted for each numeric setting.
 */
import type { BottomType, ModuleParameters, TopType } from "@/types/reactor";

export const TOP_TYPES = [
  "flat",
  "round",
  "custom_inlets",
  "thread_gl18",
  "thread_gl25",
  "thread_gl45",
] as const;

/** Tops closed by a threaded fitting; their radius is fixed by the thread. */
export const THREADED_TOPS: ReadonlySet<TopType> = new Set<TopType>([
  "thread_gl18",
  "thread_gl25",
  "thread_gl45",
]);

// The simple round bottom is never offered for a filter reactor.
export const BOTTOM_TYPES = ["flat", "conical", "funnel"] as const;

export const BOTTOMS_WITH_PIPE: ReadonlySet<BottomType> = new Set<BottomType>([
  "flat",
  "conical",
]);

export const ALIGN_TOP_STRATEGIES = ["expand", "lift"] as const;
export const ALIGN_FILTER_STRATEGIES = ["adapt", "lift"] as const;

export const DEFAULT_OUTPUT_NAME = "default";

/** Internal pipe diameter (mm) used when the user keeps the default. */
export const DEFAULT_PIPE_DIAMETER = 4;

export const DEFAULT_PARAMETERS: Readonly<ModuleParameters> = Object.freeze({
  volume: 20,
  typeTop: "flat",
  typeBottom: "flat",
  filterHeight: 3,
  filterDiameter: 20,
  pipeDiameter: DEFAULT_PIPE_DIAMETER,
  radius: null,
  radiusConstrained: false,
  alignTopStrategy: "expand",
  alignFilterStrategy: "adapt",
});

export type NumericField = "volume" | "filterHeight" | "filterDiameter" | "pipeDiameter" | "radius";

/** Exclusive lower bound is always 0. */
export const FIELD_LIMITS: Record<NumericField, { max: number }> = {
  volume: { max: 200 },
  filterHeight: { max: 1000 },
  filterDiameter: { max: 200 },
  pipeDiameter: { max: 50 },
  radius: { max: 100 },
};

export function isTopType(value: string): value is TopType {
  return TOP_TYPES.some((type) => type === value);
}

export function isBottomType(value: string): value is BottomType {
  return BOTTOM_TYPES.some((type) => type === value);
}

export function isThreadedTop(type: TopType): boolean {
  return THREADED_TOPS.has(type);
}

export function hasInternalPipe(type: BottomType): boolean {
  return BOTTOMS_WITH_PIPE.has(type);
}

export function isWithinLimits(field: NumericField, value: number): boolean {
  return Number.isFinite(value) && value > 0 && value <= FIELD_LIMITS[field].max;
}
