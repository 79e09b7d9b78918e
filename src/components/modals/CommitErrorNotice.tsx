import type { CommitFailure } from "@/lib/commitEngine";

interface Props {
  failure: CommitFailure | null;
  warnings: CommitFailure[];
}

export function CommitErrorNotice({ failure, warnings }: Props) {
  const shown = failure ? [failure, ...warnings] : warnings;
  if (shown.length === 0) return null;

  return (
    <div
      id="commit-error-display"
      className="rounded border border-destructive bg-destructive/10 p-3 space-y-2"
    >
      {shown.map((f, i) => (
        <div key={`${f.kind}-${i}`}>
          <h4 className="text-sm font-medium text-destructive">{f.title}</h4>
          <pre className="text-xs text-destructive whitespace-pre-wrap">{f.message}</pre>
        </div>
      ))}
    </div>
  );
}
