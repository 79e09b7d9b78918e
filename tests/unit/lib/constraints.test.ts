import { describe, it, expect } from "vitest";
import {
  applyForcedValues,
  effectiveRadius,
  resolveConstraints,
  toConstructionRequest,
} from "@/lib/constraints";
import { DEFAULT_PARAMETERS, THREADED_TOPS, TOP_TYPES } from "@/lib/reactorCatalog";
import type { ModuleParameters } from "@/types/reactor";

const params = (overrides: Partial<ModuleParameters> = {}): ModuleParameters => ({
  ...DEFAULT_PARAMETERS,
  ...overrides,
});

describe("resolveConstraints", () => {
  it("should lock radius and its constraint for every threaded top", () => {
    for (const typeTop of THREADED_TOPS) {
      for (const radiusConstrained of [true, false]) {
        const resolved = applyForcedValues(params({ typeTop, radiusConstrained, radius: 12 }));
        const availability = resolveConstraints(resolved);

        expect(resolved.radiusConstrained).toBe(true);
        expect(availability.radius).toBe(false);
        expect(availability.radiusConstrained).toBe(false);
      }
    }
  });

  it("should enable radius only when constrained on a plain top", () => {
    expect(resolveConstraints(params({ typeTop: "round", radiusConstrained: true })).radius).toBe(true);
    expect(resolveConstraints(params({ typeTop: "round", radiusConstrained: false })).radius).toBe(false);
    expect(resolveConstraints(params({ typeTop: "round" })).radiusConstrained).toBe(true);
  });

  it("should enable the pipe diameter only for bottoms with a pipe", () => {
    expect(resolveConstraints(params({ typeBottom: "flat" })).pipeDiameter).toBe(true);
    expect(resolveConstraints(params({ typeBottom: "conical" })).pipeDiameter).toBe(true);
    expect(resolveConstraints(params({ typeBottom: "funnel" })).pipeDiameter).toBe(false);
  });

  it("should keep the basic settings always editable", () => {
    for (const typeTop of TOP_TYPES) {
      const availability = resolveConstraints(params({ typeTop }));
      expect(availability.volume).toBe(true);
      expect(availability.typeTop).toBe(true);
      expect(availability.filterDiameter).toBe(true);
    }
  });
});

describe("applyForcedValues", () => {
  it("should leave plain tops untouched", () => {
    const input = params({ typeTop: "flat", radiusConstrained: false });
    expect(applyForcedValues(input)).toBe(input);
  });
});

describe("toConstructionRequest", () => {
  it("should pass the radius only when it is constrained", () => {
    expect(toConstructionRequest(params({ radius: 12, radiusConstrained: false }))).not.toHaveProperty("radius");
    expect(toConstructionRequest(params({ radius: 12, radiusConstrained: true })).radius).toBe(12);
  });

  it("should never pass a radius for a threaded top", () => {
    const threaded = params({ typeTop: "thread_gl25", radius: 12, radiusConstrained: true });
    expect(effectiveRadius(threaded)).toBeUndefined();
    expect(toConstructionRequest(threaded)).not.toHaveProperty("radius");
  });

  it("should copy every other setting", () => {
    const request = toConstructionRequest(
      params({ volume: 35, typeBottom: "conical", filterHeight: 4, pipeDiameter: 6 }),
    );
    expect(request).toEqual({
      volume: 35,
      typeTop: "flat",
      typeBottom: "conical",
      filterDiameter: 20,
      filterHeight: 4,
      pipeDiameter: 6,
      alignTopStrategy: "expand",
      alignFilterStrategy: "adapt",
    });
  });
});
