"use client";

import { useEffect, useMemo, useState } from "react";
import { ChevronLeft, ChevronRight, Sparkles, UserPlus, X } from "lucide-react";
import EmailDetail from "@/components/email-detail";
import FailureModeDialog from "@/components/failure-mode-dialog";
import NoteDialog from "@/components/note-dialog";
import { createApiClient } from "@/lib/api";
import { createCommandRunner } from "@/lib/command-runner";
import { intentForKey, isTypingTarget, type Dialog, type Intent } from "@/lib/commands";
import { canAdvance, canRetreat, formatPosition, initialSession } from "@/lib/session";
import { loadLabelerPreference, saveLabelerPreference } from "@/lib/storage";

type AnnotationWorkspaceProps = {
  initialRunId: string | null;
};

const shortcuts: Array<[string, string]> = [
  ["← / h", "previous"],
  ["→ / l", "next"],
  ["z", "pass"],
  ["x", "fail"],
  ["d", "clear judgment"],
  ["a / n", "note"],
  ["f", "failure mode"],
  ["s", "suggest"],
];

export default function AnnotationWorkspace({ initialRunId }: AnnotationWorkspaceProps) {
  const [session, setSession] = useState(initialSession);
  const [runInput, setRunInput] = useState(initialRunId ?? "");
  const [dialog, setDialog] = useState<Dialog | null>(null);
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const runner = useMemo(
    () =>
      createCommandRunner(createApiClient(), {
        alert: (message) => window.alert(message),
        confirm: (message) => window.confirm(message),
        prompt: (message) => window.prompt(message),
        loadLabelerPreference,
        saveLabelerPreference,
        onSession: setSession,
        onDialog: setDialog,
        onBusy: setBusy,
        onError: setError,
      }),
    []
  );

  const labelerNames = useMemo(() => new Map(session.labelers), [session.labelers]);

  function dispatch(intent: Intent) {
    void runner.dispatch(intent);
  }

  useEffect(() => {
    void runner.start(initialRunId);
  }, [runner, initialRunId]);

  useEffect(() => {
    setRunInput(session.runId ?? "");
  }, [session.runId]);

  useEffect(() => {
    function onKeyDown(event: KeyboardEvent) {
      if (dialog) {
        return;
      }
      const target = event.target instanceof HTMLElement ? event.target : null;
      const intent = intentForKey(event, isTypingTarget(target));
      if (!intent) {
        return;
      }
      event.preventDefault();
      void runner.dispatch(intent);
    }

    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, [dialog, runner]);

  const view = session.view;
  const navButton =
    "inline-flex h-8 w-8 items-center justify-center rounded-md border border-border text-foreground transition hover:bg-secondary/60 disabled:opacity-40";
  const actionButton =
    "rounded-md border border-border px-3 py-1.5 text-xs font-semibold text-foreground transition hover:border-accent hover:bg-secondary/60 disabled:opacity-50";

  return (
    <main className="min-h-screen">
      <div className="mx-auto flex max-w-[1100px] flex-col gap-6 p-6">
        <header className="space-y-3">
          <div className="flex flex-wrap items-center gap-3">
            <h1 className="text-2xl font-semibold text-foreground">Email annotation</h1>
            {session.runId ? (
              <span className="rounded-full border border-border px-2 py-1 font-mono text-xs text-muted-foreground">
                {session.runId}
              </span>
            ) : null}
            {busy ? (
              <span className="rounded-full border border-indigo-200 bg-indigo-50 px-2 py-1 text-xs font-medium text-indigo-700">
                Working...
              </span>
            ) : null}
          </div>

          <div className="flex flex-wrap items-center gap-3 rounded-md border border-border bg-card/80 p-3">
            <form
              className="flex items-center gap-2"
              onSubmit={(event) => {
                event.preventDefault();
                dispatch({ kind: "jumpToRun", runId: runInput });
              }}
            >
              <input
                value={runInput}
                onChange={(event) => setRunInput(event.target.value)}
                placeholder="Run id (latest if empty)"
                className="w-56 rounded-md border border-border bg-background/80 px-2 py-1 font-mono text-xs text-foreground focus:border-accent focus:outline-none"
              />
              <button type="submit" disabled={busy} className={actionButton}>
                Load run
              </button>
            </form>

            <div className="flex items-center gap-2">
              <select
                value={session.labelerId ?? ""}
                onChange={(event) =>
                  dispatch({ kind: "selectLabeler", labelerId: event.target.value })
                }
                className="rounded-md border border-border bg-background/80 px-2 py-1 text-xs text-foreground focus:border-accent focus:outline-none"
              >
                <option value="">Select labeler</option>
                {session.labelers.map(([id, name]) => (
                  <option key={id} value={id}>
                    {name}
                  </option>
                ))}
              </select>
              <button
                type="button"
                aria-label="New labeler"
                disabled={busy}
                onClick={() => void runner.addLabeler()}
                className={navButton}
              >
                <UserPlus className="h-4 w-4" />
              </button>
            </div>

            <div className="ml-auto flex items-center gap-2">
              <button
                type="button"
                aria-label="Previous email"
                disabled={busy || !canRetreat(session)}
                onClick={() => dispatch({ kind: "retreat" })}
                className={navButton}
              >
                <ChevronLeft className="h-4 w-4" />
              </button>
              <span className="min-w-16 text-center font-mono text-xs text-muted-foreground">
                {formatPosition(session)}
              </span>
              <button
                type="button"
                aria-label="Next email"
                disabled={busy || !canAdvance(session)}
                onClick={() => dispatch({ kind: "advance" })}
                className={navButton}
              >
                <ChevronRight className="h-4 w-4" />
              </button>
            </div>
          </div>

          {error ? (
            <div className="flex items-start justify-between gap-3 rounded-md border border-danger/40 bg-danger/10 p-3 text-sm text-danger">
              <span>{error}</span>
              <button
                type="button"
                aria-label="Dismiss error"
                onClick={() => setError(null)}
                className="rounded-md p-0.5 transition hover:bg-danger/20"
              >
                <X className="h-3.5 w-3.5" />
              </button>
            </div>
          ) : null}
        </header>

        {view ? (
          <>
            <div className="flex flex-wrap items-center gap-2">
              <button
                type="button"
                disabled={busy}
                onClick={() => dispatch({ kind: "judge", pass: true })}
                className="rounded-md border border-success/40 bg-success/10 px-3 py-1.5 text-xs font-semibold text-success transition hover:bg-success/20 disabled:opacity-50"
              >
                Pass
              </button>
              <button
                type="button"
                disabled={busy}
                onClick={() => dispatch({ kind: "judge", pass: false })}
                className="rounded-md border border-danger/40 bg-danger/10 px-3 py-1.5 text-xs font-semibold text-danger transition hover:bg-danger/20 disabled:opacity-50"
              >
                Fail
              </button>
              <button
                type="button"
                disabled={busy || view.judgment.kind === "none"}
                onClick={() => dispatch({ kind: "deleteJudgment" })}
                className={actionButton}
              >
                Clear judgment
              </button>
              <button
                type="button"
                disabled={busy}
                onClick={() => dispatch({ kind: "openNote" })}
                className={actionButton}
              >
                {view.ownAnnotation ? "Edit note" : "Add note"}
              </button>
              <button
                type="button"
                disabled={busy}
                onClick={() => dispatch({ kind: "openFailureMode" })}
                className={actionButton}
              >
                Failure mode
              </button>
              <button
                type="button"
                disabled={busy}
                onClick={() => dispatch({ kind: "suggestFailureModes" })}
                className={`${actionButton} inline-flex items-center gap-1`}
              >
                <Sparkles className="h-3.5 w-3.5" />
                Suggest
              </button>
            </div>

            <EmailDetail
              view={view}
              labelerNames={labelerNames}
              disabled={busy}
              onDeleteAnnotation={(annotationId) =>
                dispatch({ kind: "deleteAnnotation", annotationId })
              }
              onDetachFailureMode={(annotationId, failureModeId) =>
                dispatch({ kind: "detachFailureMode", annotationId, failureModeId })
              }
            />
          </>
        ) : busy || session.emailHashes.length === 0 ? (
          <div className="rounded-md border border-dashed border-border bg-background/70 p-6 text-sm text-muted-foreground">
            {busy ? "Loading..." : "No emails in this run."}
          </div>
        ) : null}

        <footer className="flex flex-wrap gap-3 text-[11px] text-muted-foreground">
          {shortcuts.map(([keys, label]) => (
            <span key={keys}>
              <kbd className="rounded border border-border bg-muted/60 px-1 font-mono">{keys}</kbd>{" "}
              {label}
            </span>
          ))}
        </footer>
      </div>

      {dialog === "note" && view ? (
        <NoteDialog
          key={view.emailHash}
          initialText={view.ownAnnotation?.open_code ?? ""}
          busy={busy}
          onSave={(text) => dispatch({ kind: "saveNote", text })}
          onClose={() => setDialog(null)}
        />
      ) : null}
      {dialog === "failureMode" && view ? (
        <FailureModeDialog
          key={view.emailHash}
          availableFailureModes={view.availableFailureModes}
          busy={busy}
          onAttach={(selection) => dispatch({ kind: "attachFailureMode", selection })}
          onCreate={(displayName, definition) =>
            dispatch({ kind: "createFailureMode", displayName, definition })
          }
          onClose={() => setDialog(null)}
        />
      ) : null}
    </main>
  );
}
