import { create } from "zustand";
import { ReservedIOError, SelectionError } from "@/lib/errors";
import {
  DEFAULT_OUTPUT_LABEL,
  SIDE_IO_LABELS,
  TOP_INLET_LABELS,
  connectionLabel,
} from "@/lib/labels";
import type { Logger } from "@/lib/logger";
import { DEFAULT_OUTPUT_NAME } from "@/lib/reactorCatalog";
import type { FilterReactorHandle, PlacedSideIO } from "@/types/geometry";
import type {
  IOEntry,
  IOKind,
  IORef,
  IORow,
  IOSnapshot,
  SideIODescriptor,
  TopInletDescriptor,
} from "@/types/reactor";

export type IODeleteResult =
  | { deleted: true; ref: IORef }
  | { deleted: false; error: SelectionError };

export interface IORegistryState {
  /** Insertion order is display order. */
  entries: IOEntry[];
  selected: IORef | null;

  // Actions
  addOrUpdate: (entry: IOEntry) => "added" | "updated";
  find: (kind: IOKind, name: string) => IOEntry | undefined;
  select: (ref: IORef | null) => void;
  remove: (kind: IOKind, name: string) => IODeleteResult;
  deleteSelected: () => IODeleteResult;
  snapshot: () => IOSnapshot;
  restoreFromHandle: (handle: FilterReactorHandle) => void;
  reset: () => void;
}

export function isDefaultOutput(ref: IORef): boolean {
  return ref.kind === "output" && ref.name === DEFAULT_OUTPUT_NAME;
}

function matches(entry: IOEntry, kind: IOKind, name: string): boolean {
  return entry.kind === kind && entry.descriptor.name === name;
}

function typeLabel(entry: IOEntry): string {
  switch (entry.kind) {
    case "input":
      return SIDE_IO_LABELS.input;
    case "output":
      return entry.descriptor.name === DEFAULT_OUTPUT_NAME
        ? DEFAULT_OUTPUT_LABEL
        : SIDE_IO_LABELS.output;
    case "topInlet":
      return TOP_INLET_LABELS[entry.descriptor.type];
  }
}

/** Display rows for the I/O table. */
export function toIORows(entries: readonly IOEntry[]): IORow[] {
  return entries.map((entry) => {
    const ref = { kind: entry.kind, name: entry.descriptor.name };
    return {
      ...ref,
      typeLabel: typeLabel(entry),
      connectedLabel: connectionLabel(entry.descriptor.connected),
      selectable: !isDefaultOutput(ref),
    };
  });
}

function withConnected(entry: IOEntry, connected: boolean): IOEntry {
  switch (entry.kind) {
    case "input":
      return { kind: "input", descriptor: { ...entry.descriptor, connected } };
    case "output":
      return { kind: "output", descriptor: { ...entry.descriptor, connected } };
    case "topInlet":
      return { kind: "topInlet", descriptor: { ...entry.descriptor, connected } };
  }
}

function restoreSideIO(
  handle: FilterReactorHandle,
  name: string,
  io: PlacedSideIO,
): SideIODescriptor {
  return {
    name,
    heightFraction: handle.getHeightFraction(io),
    angle: io.angle,
    diameter: io.diameter,
    external: io.external,
    connected: io.connected,
  };
}

export function createIORegistryStore({ logger }: { logger: Logger }) {
  return create<IORegistryState>((set, get) => ({
    entries: [],
    selected: null,

    addOrUpdate: (entry) => {
      const { name } = entry.descriptor;
      if (isDefaultOutput({ kind: entry.kind, name })) {
        throw new ReservedIOError(`Output name "${DEFAULT_OUTPUT_NAME}" is reserved`);
      }

      const { entries } = get();
      const existing = entries.find((e) => matches(e, entry.kind, name));
      if (!existing) {
        set({ entries: [...entries, entry] });
        logger.debug(`Added ${entry.kind} ${name}`, entry.descriptor);
        return "added";
      }

      // The connection state belongs to the assembly, not to the form.
      const replacement = withConnected(entry, existing.descriptor.connected);
      set({
        entries: entries.map((e) => (e === existing ? replacement : e)),
      });
      logger.debug(`Updated ${entry.kind} ${name}`, entry.descriptor);
      return "updated";
    },

    find: (kind, name) => get().entries.find((e) => matches(e, kind, name)),

    select: (ref) => {
      if (ref && isDefaultOutput(ref)) {
        return;
      }
      set({ selected: ref });
    },

    remove: (kind, name) => {
      const { entries, selected } = get();
      const ref = { kind, name };
      if (isDefaultOutput(ref) || !entries.some((e) => matches(e, kind, name))) {
        const error = new SelectionError(`No deletable ${kind} named "${name}"`);
        logger.debug(error.message);
        return { deleted: false, error };
      }

      set({
        entries: entries.filter((e) => !matches(e, kind, name)),
        selected:
          selected && selected.kind === kind && selected.name === name ? null : selected,
      });
      logger.debug(`Deleted ${kind} ${name}`);
      return { deleted: true, ref };
    },

    deleteSelected: () => {
      const { selected } = get();
      if (!selected) {
        const error = new SelectionError("No I/O selected, can't delete");
        logger.debug(error.message);
        return { deleted: false, error };
      }
      return get().remove(selected.kind, selected.name);
    },

    snapshot: () => {
      const { entries } = get();
      return {
        inputs: entries.flatMap((e): SideIODescriptor[] =>
          e.kind === "input" ? [e.descriptor] : [],
        ),
        outputs: entries.flatMap((e): SideIODescriptor[] =>
          e.kind === "output" ? [e.descriptor] : [],
        ),
        topInlets: entries.flatMap((e): TopInletDescriptor[] =>
          e.kind === "topInlet" ? [e.descriptor] : [],
        ),
      };
    },

    restoreFromHandle: (handle) => {
      const entries: IOEntry[] = [];
      for (const [name, io] of handle.inputs) {
        entries.push({ kind: "input", descriptor: restoreSideIO(handle, name, io) });
      }
      for (const [name, io] of handle.outputs) {
        entries.push({ kind: "output", descriptor: restoreSideIO(handle, name, io) });
      }
      for (const [name, inlet] of handle.topInlets) {
        const descriptor: TopInletDescriptor =
          inlet.type === "luer"
            ? { name, type: "luer", connected: inlet.connected }
            : {
                name,
                type: "custom",
                diameter: inlet.diameter ?? 0,
                length: inlet.length ?? 0,
                walls: inlet.walls ?? 0,
                connected: inlet.connected,
              };
        entries.push({ kind: "topInlet", descriptor });
      }
      set({ entries, selected: null });
      logger.debug(`Restored ${entries.length} I/O`);
    },

    reset: () => set({ entries: [], selected: null }),
  }));
}

export type IORegistryStore = ReturnType<typeof createIORegistryStore>;
