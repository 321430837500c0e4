"use client";

import { useState } from "react";
import { X } from "lucide-react";
import type { FailureMode } from "@/lib/types";
import type { FailureModeSelection } from "@/lib/mutations";

type FailureModeDialogProps = {
  availableFailureModes: FailureMode[];
  busy: boolean;
  onAttach: (selection: FailureModeSelection) => void;
  onCreate: (displayName: string, definition: string) => void;
  onClose: () => void;
};

const NEW_MODE = "__new__";

export default function FailureModeDialog({
  availableFailureModes,
  busy,
  onAttach,
  onCreate,
  onClose,
}: FailureModeDialogProps) {
  const [choice, setChoice] = useState(availableFailureModes[0]?.failure_mode_id ?? NEW_MODE);
  const [displayName, setDisplayName] = useState("");
  const [definition, setDefinition] = useState("");

  const creating = choice === NEW_MODE;
  const selected = availableFailureModes.find((mode) => mode.failure_mode_id === choice);

  function submit() {
    onAttach(
      creating
        ? { kind: "new", displayName, definition }
        : { kind: "existing", failureModeId: choice }
    );
  }

  return (
    <div className="fixed inset-0 z-50 flex items-center justify-center bg-foreground/30 p-4">
      <form
        className="w-full max-w-lg space-y-4 rounded-md border border-border bg-card p-5 shadow-lg"
        onSubmit={(event) => {
          event.preventDefault();
          submit();
        }}
        onKeyDown={(event) => {
          if (event.key === "Escape") {
            onClose();
          }
        }}
      >
        <div className="flex items-center justify-between">
          <h2 className="text-xs font-semibold uppercase tracking-[0.2em] text-foreground">
            Assign failure mode
          </h2>
          <button
            type="button"
            aria-label="Close"
            onClick={onClose}
            className="inline-flex h-6 w-6 items-center justify-center rounded-md border border-border text-muted-foreground transition hover:bg-secondary/60"
          >
            <X className="h-3.5 w-3.5" />
          </button>
        </div>

        <label className="block space-y-1 text-xs text-muted-foreground">
          <span className="uppercase tracking-[0.2em]">Failure mode</span>
          <select
            autoFocus
            value={choice}
            onChange={(event) => setChoice(event.target.value)}
            className="w-full rounded-md border border-border bg-background/80 px-2 py-1.5 text-sm text-foreground focus:border-accent focus:outline-none"
          >
            {availableFailureModes.map((mode) => (
              <option key={mode.failure_mode_id} value={mode.failure_mode_id}>
                {mode.display_name}
              </option>
            ))}
            <option value={NEW_MODE}>New failure mode...</option>
          </select>
        </label>

        {selected?.definition ? (
          <p className="rounded-md border border-border bg-muted/60 p-3 text-xs text-muted-foreground">
            {selected.definition}
          </p>
        ) : null}

        {creating ? (
          <div className="space-y-3">
            <input
              value={displayName}
              onChange={(event) => setDisplayName(event.target.value)}
              placeholder="Name"
              className="w-full rounded-md border border-border bg-background/80 px-2 py-1.5 text-sm text-foreground focus:border-accent focus:outline-none"
            />
            <textarea
              value={definition}
              onChange={(event) => setDefinition(event.target.value)}
              rows={3}
              placeholder="Definition (optional)"
              className="w-full resize-y rounded-md border border-border bg-background/80 p-2 text-sm text-foreground focus:border-accent focus:outline-none"
            />
          </div>
        ) : null}

        <div className="flex justify-end gap-2">
          {creating ? (
            <button
              type="button"
              disabled={busy}
              onClick={() => onCreate(displayName, definition)}
              className="rounded-md border border-border px-3 py-1.5 text-xs font-semibold text-foreground transition hover:bg-secondary/60 disabled:opacity-50"
            >
              Add to list only
            </button>
          ) : null}
          <button
            type="submit"
            disabled={busy}
            className="rounded-md bg-accent px-3 py-1.5 text-xs font-semibold text-accent-foreground transition hover:opacity-90 disabled:opacity-50"
          >
            Assign
          </button>
        </div>
      </form>
    </div>
  );
}
