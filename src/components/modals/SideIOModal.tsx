import { useEffect, useState } from "react";
import { toast } from "sonner";
import { inputClasses } from "@/components/ui/NumberField";
import { Button } from "@/components/ui/Button";
import { describeError } from "@/lib/errors";
import { SIDE_IO_LABELS } from "@/lib/labels";
import { fractionToPercent, parseNumberInput, percentToFraction } from "@/lib/units";
import type { IORegistryStore } from "@/stores/ioRegistryStore";
import type { SideIODescriptor } from "@/types/reactor";

type SideKind = "input" | "output";

interface Props {
  open: boolean;
  onClose: () => void;
  store: IORegistryStore;
  /** Entry being edited, or null to create one. */
  initial: { kind: SideKind; descriptor: SideIODescriptor } | null;
}

const SIDE_KINDS: SideKind[] = ["input", "output"];

export function SideIOModal({ open, onClose, store, initial }: Props) {
  const [name, setName] = useState("");
  const [kind, setKind] = useState<SideKind>("input");
  const [height, setHeight] = useState("50");
  const [angle, setAngle] = useState("0");
  const [diameter, setDiameter] = useState("2");
  const [external, setExternal] = useState(false);

  useEffect(() => {
    if (!open) return;
    setName(initial?.descriptor.name ?? "");
    setKind(initial?.kind ?? "input");
    setHeight(String(fractionToPercent(initial?.descriptor.heightFraction ?? 0.5)));
    setAngle(String(initial?.descriptor.angle ?? 0));
    setDiameter(String(initial?.descriptor.diameter ?? 2));
    setExternal(initial?.descriptor.external ?? false);
  }, [open, initial]);

  if (!open) return null;

  const handleSubmit = () => {
    const trimmedName = name.trim();
    if (!trimmedName) {
      toast.error("I/O name is required");
      return;
    }
    const percent = parseNumberInput(height);
    const angleValue = parseNumberInput(angle);
    const diameterValue = parseNumberInput(diameter);
    if (Number.isNaN(percent) || Number.isNaN(angleValue) || !(diameterValue > 0)) {
      toast.error("Height, angle and a positive diameter are required");
      return;
    }
    try {
      const status = store.getState().addOrUpdate({
        kind,
        descriptor: {
          name: trimmedName,
          heightFraction: percentToFraction(percent),
          angle: angleValue,
          diameter: diameterValue,
          external,
          connected: false,
        },
      });
      toast.success(`${SIDE_IO_LABELS[kind]} "${trimmedName}" ${status}`);
      onClose();
    } catch (err) {
      toast.error(describeError(err));
    }
  };

  return (
    <div
      id="side-io-modal"
      className="fixed inset-0 z-50 flex items-center justify-center bg-black/50"
      onClick={(e) => { if (e.target === e.currentTarget) onClose(); }}
    >
      <div className="w-full max-w-md bg-card border border-border rounded-lg shadow-lg p-6 space-y-4">
        <h2 className="text-lg font-semibold text-foreground">
          {initial ? "Modify side I/O" : "Add side I/O"}
        </h2>

        <label className="block text-xs text-muted-foreground">
          Name
          <input
            id="side-io-name"
            value={name}
            disabled={initial !== null}
            onChange={(e) => setName(e.target.value)}
            className={inputClasses}
            autoFocus
          />
        </label>

        <label className="block text-xs text-muted-foreground">
          Type
          <select
            id="side-io-kind"
            value={kind}
            disabled={initial !== null}
            onChange={(e) => setKind(e.target.value === "output" ? "output" : "input")}
            className={inputClasses}
          >
            {SIDE_KINDS.map((k) => (
              <option key={k} value={k}>
                {SIDE_IO_LABELS[k]}
              </option>
            ))}
          </select>
        </label>

        <div className="grid grid-cols-3 gap-2">
          <label className="block text-xs text-muted-foreground">
            Height (%)
            <input
              id="side-io-height"
              type="number"
              min="0"
              max="100"
              value={height}
              onChange={(e) => setHeight(e.target.value)}
              className={inputClasses}
            />
          </label>
          <label className="block text-xs text-muted-foreground">
            Angle (°)
            <input
              id="side-io-angle"
              type="number"
              value={angle}
              onChange={(e) => setAngle(e.target.value)}
              className={inputClasses}
            />
          </label>
          <label className="block text-xs text-muted-foreground">
            Diameter
            <input
              id="side-io-diameter"
              type="number"
              value={diameter}
              onChange={(e) => setDiameter(e.target.value)}
              className={inputClasses}
            />
          </label>
        </div>

        <label className="flex items-center gap-2 text-xs text-muted-foreground">
          <input
            id="side-io-external"
            type="checkbox"
            checked={external}
            onChange={(e) => setExternal(e.target.checked)}
          />
          External
        </label>

        <div className="flex justify-end gap-2 pt-2">
          <Button onClick={onClose} variant="secondary" size="sm">
            Cancel
          </Button>
          <Button id="save-side-io" onClick={handleSubmit} variant="primary" size="sm">
            {initial ? "Save" : "Add"}
          </Button>
        </div>
      </div>
    </div>
  );
}
