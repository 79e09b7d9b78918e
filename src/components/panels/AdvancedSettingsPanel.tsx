import { useStore } from "zustand";
import { NumberField, inputClasses } from "@/components/ui/NumberField";
import {
  ALIGN_FILTER_STRATEGY_LABELS,
  ALIGN_TOP_STRATEGY_LABELS,
  FIELD_LABELS,
  fromLabel,
} from "@/lib/labels";
import { ALIGN_FILTER_STRATEGIES, ALIGN_TOP_STRATEGIES } from "@/lib/reactorCatalog";
import type { ParameterStore } from "@/stores/parameterStore";

interface Props {
  store: ParameterStore;
}

export function AdvancedSettingsPanel({ store }: Props) {
  const parameters = useStore(store, (s) => s.parameters);
  const availability = useStore(store, (s) => s.availability);
  const setField = useStore(store, (s) => s.setField);

  return (
    <div id="advanced-settings" className="space-y-3">
      <NumberField
        id="reactor-radius"
        label={FIELD_LABELS.radius}
        value={parameters.radius}
        disabled={!availability.radius}
        onCommit={(v) => setField("radius", v)}
      />

      <label className="flex items-center gap-2 text-xs text-muted-foreground">
        <input
          id="reactor-radius-constrained"
          type="checkbox"
          checked={parameters.radiusConstrained}
          disabled={!availability.radiusConstrained}
          onChange={(e) => setField("radiusConstrained", e.target.checked)}
        />
        {FIELD_LABELS.radiusConstrained}
      </label>

      <NumberField
        id="reactor-pipe-diameter"
        label={FIELD_LABELS.pipeDiameter}
        value={parameters.pipeDiameter}
        disabled={!availability.pipeDiameter}
        onCommit={(v) => setField("pipeDiameter", v)}
      />

      <label className="block text-xs text-muted-foreground">
        {FIELD_LABELS.alignTopStrategy}
        <select
          id="reactor-align-top"
          value={ALIGN_TOP_STRATEGY_LABELS[parameters.alignTopStrategy]}
          onChange={(e) => {
            const strategy = fromLabel(
              ALIGN_TOP_STRATEGIES,
              ALIGN_TOP_STRATEGY_LABELS,
              e.target.value,
            );
            if (strategy) setField("alignTopStrategy", strategy);
          }}
          className={inputClasses}
        >
          {ALIGN_TOP_STRATEGIES.map((s) => (
            <option key={s}>{ALIGN_TOP_STRATEGY_LABELS[s]}</option>
          ))}
        </select>
      </label>

      <label className="block text-xs text-muted-foreground">
        {FIELD_LABELS.alignFilterStrategy}
        <select
          id="reactor-align-filter"
          value={ALIGN_FILTER_STRATEGY_LABELS[parameters.alignFilterStrategy]}
          onChange={(e) => {
            const strategy = fromLabel(
              ALIGN_FILTER_STRATEGIES,
              ALIGN_FILTER_STRATEGY_LABELS,
              e.target.value,
            );
            if (strategy) setField("alignFilterStrategy", strategy);
          }}
          className={inputClasses}
        >
          {ALIGN_FILTER_STRATEGIES.map((s) => (
            <option key={s}>{ALIGN_FILTER_STRATEGY_LABELS[s]}</option>
          ))}
        </select>
      </label>
    </div>
  );
}
