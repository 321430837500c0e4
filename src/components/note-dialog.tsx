"use client";

import { useEffect, useRef, useState } from "react";
import { X } from "lucide-react";

type NoteDialogProps = {
  initialText: string;
  busy: boolean;
  onSave: (text: string) => void;
  onClose: () => void;
};

export default function NoteDialog({ initialText, busy, onSave, onClose }: NoteDialogProps) {
  const [text, setText] = useState(initialText);
  const textareaRef = useRef<HTMLTextAreaElement>(null);

  useEffect(() => {
    textareaRef.current?.focus();
  }, []);

  return (
    <div className="fixed inset-0 z-50 flex items-center justify-center bg-foreground/30 p-4">
      <form
        className="w-full max-w-lg space-y-4 rounded-md border border-border bg-card p-5 shadow-lg"
        onSubmit={(event) => {
          event.preventDefault();
          onSave(text);
        }}
        onKeyDown={(event) => {
          if (event.key === "Escape") {
            onClose();
          }
        }}
      >
        <div className="flex items-center justify-between">
          <h2 className="text-xs font-semibold uppercase tracking-[0.2em] text-foreground">
            {initialText ? "Edit note" : "Add note"}
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
        <textarea
          ref={textareaRef}
          value={text}
          onChange={(event) => setText(event.target.value)}
          rows={6}
          placeholder="Describe what the model got wrong or right..."
          className="w-full resize-y rounded-md border border-border bg-background/80 p-3 text-sm text-foreground focus:border-accent focus:outline-none"
        />
        <div className="flex justify-end gap-2">
          <button
            type="button"
            onClick={onClose}
            className="rounded-md border border-border px-3 py-1.5 text-xs font-semibold text-foreground transition hover:bg-secondary/60"
          >
            Cancel
          </button>
          <button
            type="submit"
            disabled={busy}
            className="rounded-md bg-accent px-3 py-1.5 text-xs font-semibold text-accent-foreground transition hover:opacity-90 disabled:opacity-50"
          >
            Save note
          </button>
        </div>
      </form>
    </div>
  );
}
