import { useMemo, useState } from "react";
import { useStore } from "zustand";
import { SideIOModal } from "@/components/modals/SideIOModal";
import { TopInletModal } from "@/components/modals/TopInletModal";
import { Button } from "@/components/ui/Button";
import { cn } from "@/lib/cn";
import { toIORows, type IORegistryStore } from "@/stores/ioRegistryStore";
import type { IORow, SideIODescriptor, TopInletDescriptor } from "@/types/reactor";

interface Props {
  store: IORegistryStore;
}

type Dialog =
  | { type: "choose" }
  | { type: "side"; initial: { kind: "input" | "output"; descriptor: SideIODescriptor } | null }
  | { type: "top"; initial: TopInletDescriptor | null };

export function IOTablePanel({ store }: Props) {
  const entries = useStore(store, (s) => s.entries);
  const selected = useStore(store, (s) => s.selected);
  const [dialog, setDialog] = useState<Dialog | null>(null);

  const rows = useMemo(() => toIORows(entries), [entries]);

  const isSelected = (row: IORow) =>
    selected !== null && selected.kind === row.kind && selected.name === row.name;

  const handleSelect = (row: IORow) => {
    if (row.selectable) store.getState().select({ kind: row.kind, name: row.name });
  };

  const handleEdit = (row: IORow) => {
    if (!row.selectable) return;
    const entry = store.getState().find(row.kind, row.name);
    if (!entry) return;
    if (entry.kind === "topInlet") {
      setDialog({ type: "top", initial: entry.descriptor });
    } else {
      setDialog({ type: "side", initial: { kind: entry.kind, descriptor: entry.descriptor } });
    }
  };

  return (
    <div id="io-tab" className="space-y-3">
      <table className="w-full text-xs">
        <thead>
          <tr className="text-left text-muted-foreground">
            <th className="py-1">Name</th>
            <th className="py-1">Type</th>
            <th className="py-1">Connected</th>
          </tr>
        </thead>
        <tbody className="divide-y divide-border">
          {rows.map((row) => (
            <tr
              key={`${row.kind}:${row.name}`}
              data-testid="io-row"
              aria-selected={isSelected(row)}
              onClick={() => handleSelect(row)}
              onDoubleClick={() => handleEdit(row)}
              className={cn(
                row.selectable ? "cursor-pointer hover:bg-accent" : "opacity-60",
                isSelected(row) && "bg-accent",
              )}
            >
              <td className="py-1.5 text-foreground">{row.name}</td>
              <td className="py-1.5">{row.typeLabel}</td>
              <td className="py-1.5">{row.connectedLabel}</td>
            </tr>
          ))}
          {rows.length === 0 && (
            <tr>
              <td colSpan={3} className="py-1 italic text-muted-foreground">
                No inputs or outputs
              </td>
            </tr>
          )}
        </tbody>
      </table>

      <div className="flex gap-2">
        <Button id="add-io" onClick={() => setDialog({ type: "choose" })} variant="primary" size="sm">
          Add I/O
        </Button>
        <Button
          id="delete-io"
          onClick={() => store.getState().deleteSelected()}
          variant="destructive"
          size="sm"
        >
          Delete I/O
        </Button>
      </div>

      {dialog?.type === "choose" && (
        <div id="choose-io-type" className="rounded-md border border-border p-3 space-y-2">
          <p className="text-xs text-muted-foreground">What would you like to create:</p>
          <div className="flex gap-2">
            <Button onClick={() => setDialog({ type: "side", initial: null })} size="sm">
              A side I/O
            </Button>
            <Button onClick={() => setDialog({ type: "top", initial: null })} size="sm">
              A top I/O
            </Button>
          </div>
        </div>
      )}

      <SideIOModal
        open={dialog?.type === "side"}
        onClose={() => setDialog(null)}
        store={store}
        initial={dialog?.type === "side" ? dialog.initial : null}
      />
      <TopInletModal
        open={dialog?.type === "top"}
        onClose={() => setDialog(null)}
        store={store}
        initial={dialog?.type === "top" ? dialog.initial : null}
      />
    </div>
  );
}
