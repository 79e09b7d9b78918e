import { effectiveRadius, toConstructionRequest } from "@/lib/constraints";
import { ConstraintError, IncompatibilityError, describeError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import type { Notifier } from "@/lib/notifier";
import { DEFAULT_OUTPUT_NAME } from "@/lib/reactorCatalog";
import type {
  AssemblyHost,
  ConstructionRequest,
  FilterReactorFactory,
  FilterReactorHandle,
  TopInletSpec,
} from "@/types/geometry";
import type {
  IOSnapshot,
  ModuleParameters,
  SideIODescriptor,
  TopInletDescriptor,
} from "@/types/reactor";

export type CommitPhase =
  | "idle"
  | "validating"
  | "committing-new"
  | "committing-update"
  | "done"
  | "failed";

export type CommitMode = "create" | "update";

export type CommitFailureKind = "creation" | "update" | "io" | "auto-placement" | "refresh";

export interface CommitFailure {
  kind: CommitFailureKind;
  title: string;
  message: string;
  cause?: unknown;
}

export interface CommitSnapshot {
  parameters: Readonly<ModuleParameters>;
  io: IOSnapshot;
}

export type CommitResult =
  | { ok: true; mode: CommitMode; handle: FilterReactorHandle; warnings: CommitFailure[] }
  | {
      ok: false;
      mode: CommitMode;
      failure: CommitFailure;
      /** Whether the live module was mutated before the failure. */
      committed: boolean;
      warnings: CommitFailure[];
    };

export interface CommitEngineDeps {
  factory: FilterReactorFactory;
  host: AssemblyHost;
  logger: Logger;
  notifier: Notifier;
  onPhaseChange?: (phase: CommitPhase) => void;
}

const FAILURE_TITLES: Record<CommitFailureKind, string> = {
  creation: "Creation error",
  update: "Update error",
  io: "I/Os error",
  "auto-placement": "Auto-placement error",
  refresh: "Refresh error",
};

const AUTO_PLACEMENT_MESSAGE = "Impossible to auto-place the top inlets. Collision ?";

function failure(kind: CommitFailureKind, message: string, cause?: unknown): CommitFailure {
  return { kind, title: FAILURE_TITLES[kind], message, cause };
}

function toTopInletSpec(inlet: TopInletDescriptor): TopInletSpec {
  if (inlet.type === "luer") {
    return { type: "luer" };
  }
  return {
    type: "custom",
    diameter: inlet.diameter,
    length: inlet.length,
    walls: inlet.walls,
  };
}

function toPlacement(io: SideIODescriptor) {
  return {
    heightFraction: io.heightFraction,
    angle: io.angle,
    diameter: io.diameter,
    external: io.external,
  };
}

/**
 * Turns a parameter snapshot and the staged I/O into a module.
 *
 * A new module is all-or-nothing: it reaches the assembly only once every
 * I/O is attached. An existing module is validated with the candidate
 * parameters before anything is written to it. After validation the scalar
 * parameters are committed even if attaching the I/O fails afterwards.
 */
export class CommitEngine {
  private currentPhase: CommitPhase = "idle";

  constructor(private readonly deps: CommitEngineDeps) {}

  get phase(): CommitPhase {
    return this.currentPhase;
  }

  commit(snapshot: CommitSnapshot, live?: FilterReactorHandle | null): CommitResult {
    this.transition("validating");
    const result = live ? this.update(snapshot, live) : this.create(snapshot);
    this.transition(result.ok ? "done" : "failed");
    return result;
  }

  deleteModule(handle: FilterReactorHandle): void {
    this.deps.logger.debug("Deleting module");
    this.deps.host.deleteModule(handle);
  }

  private create(snapshot: CommitSnapshot): CommitResult {
    const { logger, host } = this.deps;
    const request = toConstructionRequest(snapshot.parameters);
    this.transition("committing-new");

    let handle: FilterReactorHandle;
    try {
      handle = this.deps.factory.construct(request);
    } catch (err) {
      const reason = failure(
        "creation",
        `Impossible to create filter reactor: ${describeError(err)}`,
        err,
      );
      return this.fail("create", reason, false, []);
    }

    const warnings: CommitFailure[] = [];
    const ioFailure = this.attachIO(handle, snapshot.io, warnings);
    if (ioFailure) {
      // The new handle is dropped; nothing reached the assembly.
      return this.fail("create", ioFailure, false, warnings);
    }

    try {
      host.buildModule(handle);
    } catch (err) {
      const reason = failure(
        "creation",
        `Impossible to create filter reactor: ${describeError(err)}`,
        err,
      );
      return this.fail("create", reason, false, warnings);
    }

    logger.info("Filter reactor created", request);
    return { ok: true, mode: "create", handle, warnings };
  }

  private update(snapshot: CommitSnapshot, live: FilterReactorHandle): CommitResult {
    const { logger, host } = this.deps;
    const params = snapshot.parameters;
    const request = toConstructionRequest(params);

    try {
      this.validate(request);
    } catch (err) {
      const reason = failure("update", `Impossible to update reactor: ${describeError(err)}`, err);
      return this.fail("update", reason, false, []);
    }

    this.transition("committing-update");

    // Radius first, so that releasing the constraint lets the module
    // recompute before the remaining parameters land.
    const radius = effectiveRadius(params);
    if (radius !== undefined) {
      live.radius = radius;
    } else {
      live.radiusConstrained = false;
    }

    live.volume = params.volume;
    live.typeTop = params.typeTop;
    live.typeBottom = params.typeBottom;
    live.pipeDiameter = params.pipeDiameter;
    live.filterHeight = params.filterHeight;
    live.filterDiameter = params.filterDiameter;
    live.alignTopStrategy = params.alignTopStrategy;
    live.alignFilterStrategy = params.alignFilterStrategy;
    logger.debug("Updated module parameters", params);

    const warnings: CommitFailure[] = [];
    const ioFailure =
      this.detachRemovedIO(live, snapshot.io) ?? this.attachIO(live, snapshot.io, warnings);
    if (ioFailure) {
      // TODO: confirm with product whether the parameters above should roll back here
      return this.fail("update", ioFailure, true, warnings);
    }

    try {
      host.refresh();
    } catch (err) {
      const reason = failure(
        "refresh",
        `Impossible to refresh filter reactor: ${describeError(err)}`,
        err,
      );
      return this.fail("update", reason, true, warnings);
    }

    return { ok: true, mode: "update", handle: live, warnings };
  }

  private validate(request: ConstructionRequest): void {
    const { factory, logger } = this.deps;
    if (factory.validate) {
      factory.validate(request);
      return;
    }
    // No dedicated check available: build a throw-away module instead.
    factory.construct(request);
    logger.debug("Validation module built and discarded");
  }

  private detachRemovedIO(handle: FilterReactorHandle, io: IOSnapshot): CommitFailure | null {
    const keep = (names: { name: string }[]) => new Set(names.map((n) => n.name));
    const inputs = keep(io.inputs);
    const outputs = keep(io.outputs);
    const topInlets = keep(io.topInlets);

    try {
      for (const name of [...handle.inputs.keys()]) {
        if (!inputs.has(name)) handle.removeInput(name);
      }
      for (const name of [...handle.outputs.keys()]) {
        if (name !== DEFAULT_OUTPUT_NAME && !outputs.has(name)) handle.removeOutput(name);
      }
      for (const name of [...handle.topInlets.keys()]) {
        if (!topInlets.has(name)) handle.removeTopInlet(name);
      }
    } catch (err) {
      return failure("io", `Impossible to create I/Os: ${describeError(err)}`, err);
    }
    return null;
  }

  private attachIO(
    handle: FilterReactorHandle,
    io: IOSnapshot,
    warnings: CommitFailure[],
  ): CommitFailure | null {
    const { logger } = this.deps;
    try {
      logger.debug("Building inputs");
      for (const input of io.inputs) {
        handle.addInput(input.name, toPlacement(input));
      }

      logger.debug("Building outputs");
      for (const output of io.outputs) {
        if (output.name === DEFAULT_OUTPUT_NAME) continue;
        handle.addOutput(output.name, toPlacement(output));
      }

      const placement = this.attachTopInlets(handle, io.topInlets);
      if (placement) {
        this.report(placement);
        warnings.push(placement);
      }
    } catch (err) {
      return failure("io", `Impossible to create I/Os: ${describeError(err)}`, err);
    }
    return null;
  }

  /** Only auto-placement is supported for now. */
  private attachTopInlets(
    handle: FilterReactorHandle,
    inlets: TopInletDescriptor[],
  ): CommitFailure | null {
    const { logger } = this.deps;
    logger.debug("Building top inlets");

    try {
      for (const inlet of inlets) {
        handle.addTopInlet(inlet.name, toTopInletSpec(inlet));
      }
      handle.autoPlaceTopInlets();
    } catch (err) {
      if (err instanceof IncompatibilityError) {
        logger.debug("Top takes no custom inlets, nothing to place");
        return null;
      }
      if (err instanceof ConstraintError) {
        logger.debug("Can't auto-place top inlets, collision?");
        return failure("auto-placement", AUTO_PLACEMENT_MESSAGE, err);
      }
      throw err;
    }
    return null;
  }

  private fail(
    mode: CommitMode,
    reason: CommitFailure,
    committed: boolean,
    warnings: CommitFailure[],
  ): CommitResult {
    this.report(reason);
    return { ok: false, mode, failure: reason, committed, warnings };
  }

  private report(reason: CommitFailure): void {
    this.deps.logger.error(reason.message, reason.cause);
    this.deps.notifier.error(reason.title, reason.message);
  }

  private transition(phase: CommitPhase): void {
    this.currentPhase = phase;
    this.deps.onPhaseChange?.(phase);
  }
}
