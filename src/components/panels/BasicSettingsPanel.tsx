import { useStore } from "zustand";
import { NumberField, inputClasses } from "@/components/ui/NumberField";
import { BOTTOM_TYPE_LABELS, FIELD_LABELS, TOP_TYPE_LABELS, fromLabel } from "@/lib/labels";
import { BOTTOM_TYPES, TOP_TYPES } from "@/lib/reactorCatalog";
import { labelWithUnit } from "@/lib/units";
import type { ParameterStore } from "@/stores/parameterStore";

interface Props {
  store: ParameterStore;
}

export function BasicSettingsPanel({ store }: Props) {
  const parameters = useStore(store, (s) => s.parameters);
  const setField = useStore(store, (s) => s.setField);

  return (
    <div id="basic-settings" className="space-y-3">
      <NumberField
        id="reactor-volume"
        label={labelWithUnit(FIELD_LABELS.volume, "mL")}
        value={parameters.volume}
        onCommit={(v) => setField("volume", v)}
      />

      <label className="block text-xs text-muted-foreground">
        {FIELD_LABELS.typeTop}
        <select
          id="reactor-top"
          value={TOP_TYPE_LABELS[parameters.typeTop]}
          onChange={(e) => {
            const type = fromLabel(TOP_TYPES, TOP_TYPE_LABELS, e.target.value);
            if (type) setField("typeTop", type);
          }}
          className={inputClasses}
        >
          {TOP_TYPES.map((t) => (
            <option key={t}>{TOP_TYPE_LABELS[t]}</option>
          ))}
        </select>
      </label>

      <label className="block text-xs text-muted-foreground">
        {FIELD_LABELS.typeBottom}
        <select
          id="reactor-bottom"
          value={BOTTOM_TYPE_LABELS[parameters.typeBottom]}
          onChange={(e) => {
            const type = fromLabel(BOTTOM_TYPES, BOTTOM_TYPE_LABELS, e.target.value);
            if (type) setField("typeBottom", type);
          }}
          className={inputClasses}
        >
          {BOTTOM_TYPES.map((t) => (
            <option key={t}>{BOTTOM_TYPE_LABELS[t]}</option>
          ))}
        </select>
      </label>

      <div className="grid grid-cols-2 gap-2">
        <NumberField
          id="reactor-filter-height"
          label={FIELD_LABELS.filterHeight}
          value={parameters.filterHeight}
          onCommit={(v) => setField("filterHeight", v)}
        />
        <NumberField
          id="reactor-filter-diameter"
          label={FIELD_LABELS.filterDiameter}
          value={parameters.filterDiameter}
          onCommit={(v) => setField("filterDiameter", v)}
        />
      </div>
    </div>
  );
}
