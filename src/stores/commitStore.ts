import { create } from "zustand";
import type { CommitFailure, CommitPhase } from "@/lib/commitEngine";

export interface CommitState {
  phase: CommitPhase;
  failure: CommitFailure | null;
  warnings: CommitFailure[];

  // Actions
  setPhase: (phase: CommitPhase) => void;
  setOutcome: (failure: CommitFailure | null, warnings: CommitFailure[]) => void;
  reset: () => void;
}

/** Commit status of one editor. */
export function createCommitStore() {
  return create<CommitState>((set) => ({
    phase: "idle",
    failure: null,
    warnings: [],

    setPhase: (phase) => set({ phase }),

    setOutcome: (failure, warnings) => set({ failure, warnings }),

    reset: () => set({ phase: "idle", failure: null, warnings: [] }),
  }));
}

export type CommitStore = ReturnType<typeof createCommitStore>;
