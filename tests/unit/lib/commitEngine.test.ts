import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import { CommitEngine, type CommitPhase, type CommitSnapshot } from "@/lib/commitEngine";
import { toConstructionRequest } from "@/lib/constraints";
import { silentLogger } from "@/lib/logger";
import { DEFAULT_PARAMETERS, DEFAULT_PIPE_DIAMETER } from "@/lib/reactorCatalog";
import { createParameterStore } from "@/stores/parameterStore";
import type { FilterReactorFactory } from "@/types/geometry";
import type {
  IOSnapshot,
  ModuleParameters,
  SideIODescriptor,
  TopInletDescriptor,
} from "@/types/reactor";
import {
  FakeFactory,
  FakeHost,
  FakeReactor,
  FREE_RADIUS,
  THREAD_RADIUS,
  ValidatingFakeFactory,
} from "../fakes/fakeGeometry";

const sideIO = (name: string, overrides: Partial<SideIODescriptor> = {}): SideIODescriptor => ({
  name,
  heightFraction: 0.5,
  angle: 0,
  diameter: 2,
  external: false,
  connected: false,
  ...overrides,
});

const customInlet = (name: string): TopInletDescriptor => ({
  name,
  type: "custom",
  diameter: 2,
  length: 5,
  walls: 1,
  connected: false,
});

function snapshot(
  parameters: Partial<ModuleParameters> = {},
  io: Partial<IOSnapshot> = {},
): CommitSnapshot {
  return {
    parameters: { ...DEFAULT_PARAMETERS, ...parameters },
    io: { inputs: [], outputs: [], topInlets: [], ...io },
  };
}

/** Everything a user could observe on a module. */
function describeModule(reactor: FakeReactor): string {
  return JSON.stringify({
    volume: reactor.volume,
    typeTop: reactor.typeTop,
    typeBottom: reactor.typeBottom,
    filterHeight: reactor.filterHeight,
    filterDiameter: reactor.filterDiameter,
    pipeDiameter: reactor.pipeDiameter,
    radius: reactor.radius,
    radiusConstrained: reactor.radiusConstrained,
    alignTopStrategy: reactor.alignTopStrategy,
    alignFilterStrategy: reactor.alignFilterStrategy,
    inputs: [...reactor.inputs],
    outputs: [...reactor.outputs],
    topInlets: [...reactor.topInlets],
  });
}

function liveReactor(parameters: Partial<ModuleParameters> = {}): FakeReactor {
  return new FakeReactor(toConstructionRequest({ ...DEFAULT_PARAMETERS, ...parameters }));
}

describe("CommitEngine", () => {
  let factory: FakeFactory;
  let host: FakeHost;
  let notifier: { error: Mock; success: Mock; info: Mock };
  let phases: CommitPhase[];

  const makeEngine = (withFactory: FilterReactorFactory = factory) =>
    new CommitEngine({
      factory: withFactory,
      host,
      logger: silentLogger,
      notifier,
      onPhaseChange: (phase) => phases.push(phase),
    });

  beforeEach(() => {
    factory = new FakeFactory();
    host = new FakeHost();
    notifier = { error: vi.fn(), success: vi.fn(), info: vi.fn() };
    phases = [];
  });

  describe("create", () => {
    it("should build a module with one input and the implicit default output", () => {
      const engine = makeEngine();

      const result = engine.commit(
        snapshot(
          {
            volume: 20,
            typeTop: "flat",
            typeBottom: "flat",
            filterHeight: 3,
            filterDiameter: 20,
            pipeDiameter: DEFAULT_PIPE_DIAMETER,
          },
          { inputs: [sideIO("in1", { heightFraction: 0.5, angle: 0, diameter: 2, external: false })] },
        ),
      );

      expect(result.ok).toBe(true);
      const reactor = factory.built[0];
      expect(factory.built).toHaveLength(1);
      expect([...reactor.inputs.keys()]).toEqual(["in1"]);
      expect([...reactor.outputs.keys()]).toEqual(["default"]);
      expect(host.modules).toEqual([reactor]);
      expect(notifier.error).not.toHaveBeenCalled();
      expect(phases).toEqual(["validating", "committing-new", "done"]);
      expect(engine.phase).toBe("done");
    });

    it("should honour a constraint checked without typing a radius", () => {
      const store = createParameterStore({ logger: silentLogger });
      store.getState().setField("radiusConstrained", true);

      const result = makeEngine().commit({
        parameters: store.getState().read(),
        io: { inputs: [], outputs: [], topInlets: [] },
      });

      expect(result.ok).toBe(true);
      expect(factory.built[0].radiusConstrained).toBe(true);
      expect(factory.built[0].radius).toBe(10);
    });

    it("should report a creation error and keep nothing", () => {
      const engine = makeEngine();

      const result = engine.commit(snapshot({ filterDiameter: 200 }));

      expect(result).toMatchObject({
        ok: false,
        mode: "create",
        committed: false,
        failure: {
          kind: "creation",
          title: "Creation error",
          message: "Impossible to create filter reactor: Filter diameter 200 does not fit the flat bottom",
        },
      });
      expect(host.modules).toHaveLength(0);
      expect(notifier.error).toHaveBeenCalledWith(
        "Creation error",
        "Impossible to create filter reactor: Filter diameter 200 does not fit the flat bottom",
      );
      expect(phases).toEqual(["validating", "committing-new", "failed"]);
    });

    it("should discard the new module when an I/O cannot be attached", () => {
      const engine = makeEngine();

      const result = engine.commit(
        snapshot({}, { inputs: [sideIO("in1"), sideIO("bad", { diameter: 0 })] }),
      );

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.kind).toBe("io");
        expect(result.failure.title).toBe("I/Os error");
        expect(result.failure.message).toBe("Impossible to create I/Os: I/O bad needs a positive diameter");
      }
      expect(host.modules).toHaveLength(0);
    });

    it("should leave the default output to the collaborator", () => {
      const engine = makeEngine();

      engine.commit(
        snapshot({}, { outputs: [sideIO("default", { diameter: 7 }), sideIO("out1")] }),
      );

      const reactor = factory.built[0];
      expect([...reactor.outputs.keys()]).toEqual(["default", "out1"]);
      expect(reactor.outputs.get("default")?.diameter).toBe(2);
    });

    it("should attach and auto-place top inlets", () => {
      const engine = makeEngine();

      const result = engine.commit(
        snapshot(
          { typeTop: "custom_inlets" },
          { topInlets: [customInlet("gas"), { name: "syringe", type: "luer", connected: false }] },
        ),
      );

      const reactor = factory.built[0];
      expect(result.ok).toBe(true);
      expect(result.warnings).toEqual([]);
      expect([...reactor.topInlets.keys()]).toEqual(["gas", "syringe"]);
      expect(reactor.topInlets.get("syringe")).toEqual({ type: "luer", connected: false });
      expect(reactor.autoPlaceCalls).toBe(1);
    });

    it("should treat a top without custom inlets as nothing to place", () => {
      const engine = makeEngine();

      const result = engine.commit(snapshot({ typeTop: "flat" }, { topInlets: [customInlet("gas")] }));

      const reactor = factory.built[0];
      expect(result.ok).toBe(true);
      expect(result.warnings).toEqual([]);
      expect(reactor.topInlets.size).toBe(0);
      expect(reactor.autoPlaceCalls).toBe(0);
      expect(notifier.error).not.toHaveBeenCalled();
    });

    it("should report an auto-placement collision without unwinding side I/O", () => {
      const engine = makeEngine();

      const result = engine.commit(
        snapshot(
          { typeTop: "custom_inlets" },
          {
            inputs: [sideIO("in1")],
            topInlets: [customInlet("a"), customInlet("b"), customInlet("c")],
          },
        ),
      );

      const reactor = factory.built[0];
      expect(result.ok).toBe(true);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toMatchObject({
        kind: "auto-placement",
        title: "Auto-placement error",
        message: "Impossible to auto-place the top inlets. Collision ?",
      });
      expect(reactor.inputs.has("in1")).toBe(true);
      expect(host.modules).toEqual([reactor]);
      expect(notifier.error).toHaveBeenCalledWith(
        "Auto-placement error",
        "Impossible to auto-place the top inlets. Collision ?",
      );
    });
  });

  describe("update", () => {
    it("should leave the live module untouched when validation fails", () => {
      const live = liveReactor({ radius: 12, radiusConstrained: true });
      live.addInput("in1", { heightFraction: 0.5, angle: 0, diameter: 2, external: false });
      const before = describeModule(live);
      const engine = makeEngine();

      const result = engine.commit(
        snapshot({ volume: 50, filterDiameter: 200, radius: 12, radiusConstrained: true }),
        live,
      );

      expect(describeModule(live)).toBe(before);
      expect(result).toMatchObject({
        ok: false,
        mode: "update",
        committed: false,
        failure: {
          kind: "update",
          title: "Update error",
          message: "Impossible to update reactor: Filter diameter 200 does not fit the flat bottom",
        },
      });
      expect(host.refreshes).toBe(0);
      expect(phases).toEqual(["validating", "failed"]);
    });

    it("should validate with a disposable module and update the live one", () => {
      const live = liveReactor();
      const engine = makeEngine();

      const result = engine.commit(snapshot({ volume: 35, typeBottom: "conical", filterHeight: 4 }), live);

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.handle).toBe(live);
      expect(factory.built).toHaveLength(1);
      expect(factory.built[0]).not.toBe(live);
      expect(host.modules).toHaveLength(0);
      expect(live.volume).toBe(35);
      expect(live.typeBottom).toBe("conical");
      expect(live.filterHeight).toBe(4);
      expect(host.refreshes).toBe(1);
      expect(phases).toEqual(["validating", "committing-update", "done"]);
    });

    it("should prefer a pure validation when the factory offers one", () => {
      const validating = new ValidatingFakeFactory();
      const engine = makeEngine(validating);

      engine.commit(snapshot({ volume: 35 }), liveReactor());

      expect(validating.validations).toBe(1);
      expect(validating.built).toHaveLength(0);
    });

    it("should let a threaded top recompute the radius", () => {
      const live = liveReactor({ typeTop: "round", radius: 12, radiusConstrained: true });
      const store = createParameterStore({ logger: silentLogger });
      store.getState().loadFromHandle(live);
      store.getState().setField("typeTop", "thread_gl18");
      const engine = makeEngine();

      const result = engine.commit(
        { parameters: store.getState().read(), io: { inputs: [], outputs: [], topInlets: [] } },
        live,
      );

      expect(result.ok).toBe(true);
      expect(live.typeTop).toBe("thread_gl18");
      expect(live.radiusConstrained).toBe(true);
      expect(live.radius).toBe(THREAD_RADIUS);
    });

    it("should apply a new constrained radius", () => {
      const live = liveReactor({ radius: 12, radiusConstrained: true });
      const engine = makeEngine();

      engine.commit(snapshot({ radius: 14, radiusConstrained: true }), live);

      expect(live.radius).toBe(14);
      expect(live.radiusConstrained).toBe(true);
    });

    it("should release the radius constraint", () => {
      const live = liveReactor({ radius: 12, radiusConstrained: true });
      const engine = makeEngine();

      engine.commit(snapshot({ radius: 12, radiusConstrained: false }), live);

      expect(live.radiusConstrained).toBe(false);
      expect(live.radius).toBe(FREE_RADIUS);
    });

    it("should detach I/O removed from the registry but keep the default output", () => {
      const live = liveReactor({ typeTop: "custom_inlets" });
      live.addInput("old", { heightFraction: 0.5, angle: 0, diameter: 2, external: false });
      live.addOutput("out1", { heightFraction: 0.5, angle: 90, diameter: 2, external: false });
      live.addTopInlet("gas", { type: "luer" });
      const engine = makeEngine();

      engine.commit(
        snapshot({ typeTop: "custom_inlets" }, { inputs: [sideIO("new")], outputs: [sideIO("out1")] }),
        live,
      );

      expect([...live.inputs.keys()]).toEqual(["new"]);
      expect([...live.outputs.keys()]).toEqual(["default", "out1"]);
      expect(live.topInlets.size).toBe(0);
    });

    it("should keep committed parameters when an I/O fails afterwards", () => {
      const live = liveReactor();
      const engine = makeEngine();

      const result = engine.commit(
        snapshot({ volume: 35 }, { inputs: [sideIO("bad", { diameter: 0 })] }),
        live,
      );

      expect(result).toMatchObject({
        ok: false,
        mode: "update",
        committed: true,
        failure: { kind: "io", message: "Impossible to create I/Os: I/O bad needs a positive diameter" },
      });
      expect(live.volume).toBe(35);
      expect(host.refreshes).toBe(0);
    });

    it("should report a refresh failure after committing", () => {
      const live = liveReactor();
      host.failRefresh = true;
      const engine = makeEngine();

      const result = engine.commit(snapshot({ volume: 35 }), live);

      expect(result).toMatchObject({
        ok: false,
        committed: true,
        failure: {
          kind: "refresh",
          title: "Refresh error",
          message: "Impossible to refresh filter reactor: viewer unavailable",
        },
      });
      expect(live.volume).toBe(35);
    });
  });

  it("should ask the assembly to delete a module", () => {
    const engine = makeEngine();
    const result = engine.commit(snapshot());
    expect(host.modules).toHaveLength(1);

    if (result.ok) engine.deleteModule(result.handle);

    expect(host.modules).toHaveLength(0);
  });
});
