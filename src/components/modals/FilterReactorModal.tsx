import { useCallback, useEffect, useMemo, useState } from "react";
import { useStore } from "zustand";
import { CommitErrorNotice } from "@/components/modals/CommitErrorNotice";
import { AdvancedSettingsPanel } from "@/components/panels/AdvancedSettingsPanel";
import { BasicSettingsPanel } from "@/components/panels/BasicSettingsPanel";
import { IOTablePanel } from "@/components/panels/IOTablePanel";
import { Button } from "@/components/ui/Button";
import { useKeyboardShortcuts } from "@/hooks/useKeyboardShortcuts";
import { CommitEngine } from "@/lib/commitEngine";
import { describeError } from "@/lib/errors";
import { FIELD_LABELS } from "@/lib/labels";
import { createLogger, type Logger } from "@/lib/logger";
import { toastNotifier, type Notifier } from "@/lib/notifier";
import { createCommitStore } from "@/stores/commitStore";
import { createIORegistryStore } from "@/stores/ioRegistryStore";
import { createParameterStore } from "@/stores/parameterStore";
import type { AssemblyHost, FilterReactorFactory, FilterReactorHandle } from "@/types/geometry";

interface Props {
  open: boolean;
  onClose: () => void;
  factory: FilterReactorFactory;
  host: AssemblyHost;
  /** Module being edited; omit to create a new one. */
  handle?: FilterReactorHandle | null;
  logger?: Logger;
  notifier?: Notifier;
}

const TABS = ["Basic", "Advanced", "Inputs/Outputs"] as const;
type Tab = (typeof TABS)[number];

export function FilterReactorModal({
  open,
  onClose,
  factory,
  host,
  handle = null,
  logger: injectedLogger,
  notifier = toastNotifier,
}: Props) {
  const [logger] = useState(() => injectedLogger ?? createLogger("FilterReactor"));
  const [parameterStore] = useState(() => createParameterStore({ logger }));
  const [ioStore] = useState(() => createIORegistryStore({ logger }));
  const [commitStore] = useState(() => createCommitStore());
  const failure = useStore(commitStore, (s) => s.failure);
  const warnings = useStore(commitStore, (s) => s.warnings);
  const invalidFields = useStore(parameterStore, (s) => s.invalidFields);
  const [activeTab, setActiveTab] = useState<Tab>("Basic");

  const engine = useMemo(
    () =>
      new CommitEngine({
        factory,
        host,
        logger,
        notifier,
        onPhaseChange: (phase) => commitStore.getState().setPhase(phase),
      }),
    [factory, host, logger, notifier, commitStore],
  );

  // Load the module being edited, or start from defaults
  useEffect(() => {
    if (!open) return;
    commitStore.getState().reset();
    setActiveTab("Basic");
    if (handle) {
      parameterStore.getState().loadFromHandle(handle);
      ioStore.getState().restoreFromHandle(handle);
    } else {
      parameterStore.getState().reset();
      ioStore.getState().reset();
    }
  }, [open, handle, parameterStore, ioStore, commitStore]);

  const handleDelete = useCallback(() => {
    if (!handle) return;
    try {
      engine.deleteModule(handle);
      notifier.info("Filter reactor deleted");
      onClose();
    } catch (err) {
      notifier.error("Delete error", `Impossible to delete filter reactor: ${describeError(err)}`);
    }
  }, [engine, handle, notifier, onClose]);

  const deleteSelectedIO = useCallback(() => {
    ioStore.getState().deleteSelected();
  }, [ioStore]);

  // The Delete key only ever removes the selected I/O, never the module
  useKeyboardShortcuts(open && activeTab === "Inputs/Outputs" ? deleteSelectedIO : null);

  if (!open) return null;

  const handleCommit = () => {
    if (invalidFields.length > 0) return;
    const result = engine.commit(
      {
        parameters: parameterStore.getState().read(),
        io: ioStore.getState().snapshot(),
      },
      handle,
    );
    commitStore.getState().setOutcome(result.ok ? null : result.failure, result.warnings);
    if (result.ok) {
      notifier.success(result.mode === "create" ? "Filter reactor created" : "Filter reactor updated");
      onClose();
    }
  };

  return (
    <div
      id="filter-reactor-modal"
      className="fixed inset-0 z-50 flex items-center justify-center bg-black/50"
      onClick={(e) => { if (e.target === e.currentTarget) onClose(); }}
    >
      <div className="w-full max-w-lg bg-card border border-border rounded-lg shadow-lg p-6 space-y-4">
        <h2 className="text-lg font-semibold text-foreground">
          {handle ? "Modify filter reactor module" : "Add a filter reactor module"}
        </h2>

        <div className="flex border-b border-border">
          {TABS.map((tab) => (
            <Button
              key={tab}
              variant="tab"
              size="tab"
              data-active={activeTab === tab}
              onClick={() => setActiveTab(tab)}
            >
              {tab}
            </Button>
          ))}
        </div>

        {activeTab === "Basic" && <BasicSettingsPanel store={parameterStore} />}
        {activeTab === "Advanced" && <AdvancedSettingsPanel store={parameterStore} />}
        {activeTab === "Inputs/Outputs" && <IOTablePanel store={ioStore} />}

        <CommitErrorNotice failure={failure} warnings={warnings} />
        {invalidFields.length > 0 && (
          <p id="invalid-fields" className="text-xs text-destructive">
            Out of range: {invalidFields.map((f) => FIELD_LABELS[f]).join(", ")}
          </p>
        )}

        <div className="flex justify-end gap-2 pt-2">
          {handle && (
            <Button id="delete-module" onClick={handleDelete} variant="destructive" size="sm">
              Delete
            </Button>
          )}
          <Button
            id="commit-module"
            onClick={handleCommit}
            disabled={invalidFields.length > 0}
            variant="primary"
            size="sm"
          >
            OK
          </Button>
        </div>
      </div>
    </div>
  );
}
