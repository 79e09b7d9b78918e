import { hasInternalPipe, isThreadedTop } from "@/lib/reactorCatalog";
import type { ConstructionRequest } from "@/types/geometry";
import type { FieldAvailability, ModuleParameters } from "@/types/reactor";

/**
 * Resolve which settings are meaningful for the given parameters.
 *
 * - radius: only when the radius is constrained and the top is not threaded
 * - radius constraint: locked (forced on) for threaded tops
 * - internal pipe diameter: only for bottoms with an internal pipe
 */
export function resolveConstraints(params: ModuleParameters): FieldAvailability {
  const threaded = isThreadedTop(params.typeTop);

  return {
    volume: true,
    typeTop: true,
    typeBottom: true,
    filterHeight: true,
    filterDiameter: true,
    pipeDiameter: hasInternalPipe(params.typeBottom),
    radius: params.radiusConstrained && !threaded,
    radiusConstrained: !threaded,
    alignTopStrategy: true,
    alignFilterStrategy: true,
  };
}

/** Apply the values a threaded top imposes. */
export function applyForcedValues(params: ModuleParameters): ModuleParameters {
  if (isThreadedTop(params.typeTop) && !params.radiusConstrained) {
    return { ...params, radiusConstrained: true };
  }
  return params;
}

/** The radius to hand to the collaborator, if the user constrains it. */
export function effectiveRadius(params: ModuleParameters): number | undefined {
  if (params.radiusConstrained && !isThreadedTop(params.typeTop) && params.radius !== null) {
    return params.radius;
  }
  return undefined;
}

export function toConstructionRequest(params: ModuleParameters): ConstructionRequest {
  const request: ConstructionRequest = {
    volume: params.volume,
    typeTop: params.typeTop,
    typeBottom: params.typeBottom,
    filterDiameter: params.filterDiameter,
    filterHeight: params.filterHeight,
    pipeDiameter: params.pipeDiameter,
    alignTopStrategy: params.alignTopStrategy,
    alignFilterStrategy: params.alignFilterStrategy,
  };
  const radius = effectiveRadius(params);
  if (radius !== undefined) {
    request.radius = radius;
  }
  return request;
}
