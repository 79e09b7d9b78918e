import { useEffect, useState } from "react";
import { cn } from "@/lib/cn";
import { parseNumberInput } from "@/lib/units";

interface Props {
  id: string;
  label: string;
  value: number | null;
  disabled?: boolean;
  /** Receives NaN for blank input. Returns false when the value was refused. */
  onCommit: (value: number) => boolean;
}

export const inputClasses =
  "block w-full mt-1 px-2 py-1.5 text-sm rounded-md bg-input border border-border text-foreground disabled:opacity-50";

export function NumberField({ id, label, value, disabled, onCommit }: Props) {
  const [text, setText] = useState(value === null ? "" : String(value));
  const [invalid, setInvalid] = useState(false);

  // Follow external changes such as restoring an existing module
  useEffect(() => {
    setText(value === null ? "" : String(value));
    setInvalid(false);
  }, [value]);

  const handleChange = (next: string) => {
    setText(next);
    setInvalid(!onCommit(parseNumberInput(next)));
  };

  return (
    <label className="block text-xs text-muted-foreground">
      {label}
      <input
        id={id}
        type="number"
        value={text}
        disabled={disabled}
        onChange={(e) => handleChange(e.target.value)}
        aria-invalid={invalid}
        className={cn(inputClasses, invalid && "border-destructive")}
      />
    </label>
  );
}
