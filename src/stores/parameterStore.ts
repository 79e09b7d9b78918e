import { create } from "zustand";
import { applyForcedValues, resolveConstraints } from "@/lib/constraints";
import type { Logger } from "@/lib/logger";
import {
  ALIGN_FILTER_STRATEGIES,
  ALIGN_TOP_STRATEGIES,
  DEFAULT_PARAMETERS,
  FIELD_LIMITS,
  isBottomType,
  isThreadedTop,
  isTopType,
  isWithinLimits,
} from "@/lib/reactorCatalog";
import type { FilterReactorHandle } from "@/types/geometry";
import type { FieldAvailability, ModuleParameters, ParameterField } from "@/types/reactor";

export interface ParameterState {
  parameters: ModuleParameters;
  availability: FieldAvailability;
  /** Fields whose last edit was refused as out of range. */
  invalidFields: ParameterField[];

  // Actions
  setField: <K extends ParameterField>(field: K, value: ModuleParameters[K]) => boolean;
  read: () => Readonly<ModuleParameters>;
  loadFromHandle: (handle: FilterReactorHandle) => void;
  reset: () => void;
}

function isValidValue(field: ParameterField, value: unknown): boolean {
  switch (field) {
    case "volume":
    case "filterHeight":
    case "filterDiameter":
    case "pipeDiameter":
      return typeof value === "number" && isWithinLimits(field, value);
    case "radius":
      return typeof value === "number" && isWithinLimits(field, value);
    case "typeTop":
      return typeof value === "string" && isTopType(value);
    case "typeBottom":
      return typeof value === "string" && isBottomType(value);
    case "alignTopStrategy":
      return ALIGN_TOP_STRATEGIES.some((s) => s === value);
    case "alignFilterStrategy":
      return ALIGN_FILTER_STRATEGIES.some((s) => s === value);
    case "radiusConstrained":
      return typeof value === "boolean";
  }
}

export function createParameterStore({ logger }: { logger: Logger }) {
  return create<ParameterState>((set, get) => ({
    parameters: { ...DEFAULT_PARAMETERS },
    availability: resolveConstraints(DEFAULT_PARAMETERS),
    invalidFields: [],

    setField: (field, value) => {
      const { parameters, availability, invalidFields } = get();
      if (!availability[field]) {
        logger.debug(`Field ${field} is disabled, ignoring ${String(value)}`);
        return false;
      }
      if (!isValidValue(field, value)) {
        logger.warn(`Rejected ${field} = ${String(value)}`);
        if (!invalidFields.includes(field)) {
          set({ invalidFields: [...invalidFields, field] });
        }
        return false;
      }

      let next: ModuleParameters = { ...parameters, [field]: value };
      if (field === "typeTop") {
        // Force the constraint before resolving availability, otherwise the
        // radius would stay enabled for a threaded top.
        const forced = applyForcedValues(next);
        if (forced !== next) {
          logger.debug(`Threaded top ${forced.typeTop}, radius constraint forced`);
        }
        next = forced;
      }
      if (next.radiusConstrained && next.radius === null && !isThreadedTop(next.typeTop)) {
        // An editable constrained radius starts at the filter radius
        next = { ...next, radius: Math.min(next.filterDiameter / 2, FIELD_LIMITS.radius.max) };
        logger.debug(`Radius constrained, starting at ${next.radius}`);
      }

      const nextAvailability = resolveConstraints(next);
      set({
        parameters: next,
        availability: nextAvailability,
        invalidFields: invalidFields.filter((f) => f !== field && nextAvailability[f]),
      });
      return true;
    },

    read: () => Object.freeze({ ...applyForcedValues(get().parameters) }),

    loadFromHandle: (handle) => {
      const parameters = applyForcedValues({
        volume: handle.volume,
        typeTop: handle.typeTop,
        typeBottom: handle.typeBottom,
        filterHeight: handle.filterHeight,
        filterDiameter: handle.filterDiameter,
        pipeDiameter: handle.pipeDiameter,
        radius: handle.radius,
        radiusConstrained: handle.radiusConstrained,
        alignTopStrategy: handle.alignTopStrategy,
        alignFilterStrategy: handle.alignFilterStrategy,
      });
      set({ parameters, availability: resolveConstraints(parameters), invalidFields: [] });
      logger.debug("Restored parameters", parameters);
    },

    reset: () =>
      set({
        parameters: { ...DEFAULT_PARAMETERS },
        availability: resolveConstraints(DEFAULT_PARAMETERS),
        invalidFields: [],
      }),
  }));
}

export type ParameterStore = ReturnType<typeof createParameterStore>;
