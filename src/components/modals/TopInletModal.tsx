import { useEffect, useState } from "react";
import { toast } from "sonner";
import { inputClasses } from "@/components/ui/NumberField";
import { Button } from "@/components/ui/Button";
import { describeError } from "@/lib/errors";
import { TOP_INLET_LABELS } from "@/lib/labels";
import { parseNumberInput } from "@/lib/units";
import type { IORegistryStore } from "@/stores/ioRegistryStore";
import type { TopInletDescriptor, TopInletType } from "@/types/reactor";

interface Props {
  open: boolean;
  onClose: () => void;
  store: IORegistryStore;
  initial: TopInletDescriptor | null;
}

const INLET_TYPES: TopInletType[] = ["custom", "luer"];

export function TopInletModal({ open, onClose, store, initial }: Props) {
  const [name, setName] = useState("");
  const [type, setType] = useState<TopInletType>("custom");
  const [diameter, setDiameter] = useState("2");
  const [length, setLength] = useState("5");
  const [walls, setWalls] = useState("1");

  useEffect(() => {
    if (!open) return;
    setName(initial?.name ?? "");
    setType(initial?.type ?? "custom");
    if (initial?.type === "custom") {
      setDiameter(String(initial.diameter));
      setLength(String(initial.length));
      setWalls(String(initial.walls));
    }
  }, [open, initial]);

  if (!open) return null;

  const buildDescriptor = (trimmedName: string): TopInletDescriptor | null => {
    if (type === "luer") {
      return { name: trimmedName, type: "luer", connected: false };
    }
    const values = [diameter, length, walls].map(parseNumberInput);
    if (values.some((v) => !(v > 0))) {
      return null;
    }
    const [d, l, w] = values;
    return { name: trimmedName, type: "custom", diameter: d, length: l, walls: w, connected: false };
  };

  const handleSubmit = () => {
    const trimmedName = name.trim();
    if (!trimmedName) {
      toast.error("Inlet name is required");
      return;
    }
    const descriptor = buildDescriptor(trimmedName);
    if (!descriptor) {
      toast.error("Diameter, length and walls must be positive");
      return;
    }
    try {
      const status = store.getState().addOrUpdate({ kind: "topInlet", descriptor });
      toast.success(`${TOP_INLET_LABELS[descriptor.type]} "${trimmedName}" ${status}`);
      onClose();
    } catch (err) {
      toast.error(describeError(err));
    }
  };

  return (
    <div
      id="top-inlet-modal"
      className="fixed inset-0 z-50 flex items-center justify-center bg-black/50"
      onClick={(e) => { if (e.target === e.currentTarget) onClose(); }}
    >
      <div className="w-full max-w-md bg-card border border-border rounded-lg shadow-lg p-6 space-y-4">
        <h2 className="text-lg font-semibold text-foreground">
          {initial ? "Modify top inlet" : "Add top inlet"}
        </h2>

        <label className="block text-xs text-muted-foreground">
          Name
          <input
            id="top-inlet-name"
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
            id="top-inlet-type"
            value={type}
            onChange={(e) => setType(e.target.value === "luer" ? "luer" : "custom")}
            className={inputClasses}
          >
            {INLET_TYPES.map((t) => (
              <option key={t} value={t}>
                {TOP_INLET_LABELS[t]}
              </option>
            ))}
          </select>
        </label>

        <div className="grid grid-cols-3 gap-2">
          <label className="block text-xs text-muted-foreground">
            Diameter
            <input
              id="top-inlet-diameter"
              type="number"
              value={diameter}
              disabled={type === "luer"}
              onChange={(e) => setDiameter(e.target.value)}
              className={inputClasses}
            />
          </label>
          <label className="block text-xs text-muted-foreground">
            Length
            <input
              id="top-inlet-length"
              type="number"
              value={length}
              disabled={type === "luer"}
              onChange={(e) => setLength(e.target.value)}
              className={inputClasses}
            />
          </label>
          <label className="block text-xs text-muted-foreground">
            Walls
            <input
              id="top-inlet-walls"
              type="number"
              value={walls}
              disabled={type === "luer"}
              onChange={(e) => setWalls(e.target.value)}
              className={inputClasses}
            />
          </label>
        </div>

        <div className="flex justify-end gap-2 pt-2">
          <Button onClick={onClose} variant="secondary" size="sm">
            Cancel
          </Button>
          <Button id="save-top-inlet" onClick={handleSubmit} variant="primary" size="sm">
            {initial ? "Save" : "Add"}
          </Button>
        </div>
      </div>
    </div>
  );
}
