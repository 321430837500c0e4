import type { ReactNode } from "react";
import { Link2Off, Trash2 } from "lucide-react";
import type { EmailViewModel, Tint } from "@/lib/view-model";

type EmailDetailProps = {
  view: EmailViewModel;
  labelerNames: Map<string, string>;
  disabled: boolean;
  onDeleteAnnotation: (annotationId: string) => void;
  onDetachFailureMode: (annotationId: string, failureModeId: string) => void;
};

const tintStyles: Record<Tint, string> = {
  pass: "border-success/40 bg-success/5",
  fail: "border-danger/40 bg-danger/5",
  none: "border-border bg-card/80",
};

function formatTimestamp(value: string) {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? value : date.toLocaleString();
}

function SectionTitle({ children }: { children: ReactNode }) {
  return (
    <h3 className="text-xs font-semibold uppercase tracking-[0.2em] text-muted-foreground">
      {children}
    </h3>
  );
}

export default function EmailDetail({
  view,
  labelerNames,
  disabled,
  onDeleteAnnotation,
  onDetachFailureMode,
}: EmailDetailProps) {
  const { judgment } = view;

  return (
    <article className={`space-y-5 rounded-md border p-5 transition ${tintStyles[view.tint]}`}>
      <header className="space-y-3">
        <div className="flex flex-wrap items-start justify-between gap-3">
          <h2 className="text-xl font-semibold text-foreground">{view.subject}</h2>
          {judgment.kind === "none" ? (
            <span className="rounded-full border border-border px-2 py-1 text-xs text-muted-foreground">
              No judgment yet
            </span>
          ) : (
            <span
              className={`rounded-full border px-2 py-1 text-xs font-medium ${
                judgment.kind === "pass"
                  ? "border-success/30 bg-success/10 text-success"
                  : "border-danger/30 bg-danger/10 text-danger"
              }`}
            >
              {judgment.kind === "pass" ? "Pass" : "Fail"} · {formatTimestamp(judgment.at)}
            </span>
          )}
        </div>
        {view.chips.length > 0 ? (
          <div className="flex flex-wrap gap-2">
            {view.chips.map((chip) => (
              <span
                key={chip.label}
                className="rounded-full border border-border bg-background/80 px-2 py-0.5 text-[11px] text-foreground"
              >
                <span className="font-semibold text-muted-foreground">{chip.label}:</span>{" "}
                {chip.value}
              </span>
            ))}
          </div>
        ) : null}
        <p className="font-mono text-[11px] text-muted-foreground">{view.emailHash}</p>
      </header>

      <section className="rounded-md border border-border bg-background/80 p-4">
        <div className="space-y-0.5 font-mono text-xs leading-5">
          {view.body.map((line, index) =>
            line.kind === "quote" ? (
              <p
                key={index}
                className="whitespace-pre-wrap border-l-2 border-border pl-2 text-muted-foreground"
              >
                {line.text}
              </p>
            ) : (
              <p key={index} className="whitespace-pre-wrap text-foreground">
                {line.text || " "}
              </p>
            )
          )}
        </div>
      </section>

      <div className="grid grid-cols-1 gap-4 md:grid-cols-2">
        <section className="space-y-2">
          <SectionTitle>Model summary</SectionTitle>
          {view.summary ? (
            <p className="whitespace-pre-wrap text-sm text-foreground">{view.summary}</p>
          ) : (
            <p className="text-sm text-muted-foreground">No model summary recorded.</p>
          )}
        </section>
        <section className="space-y-2">
          <SectionTitle>Commitments</SectionTitle>
          {view.commitments.length > 0 ? (
            <ul className="list-disc space-y-1 pl-5 text-sm text-foreground">
              {view.commitments.map((commitment, index) => (
                <li key={index}>{commitment}</li>
              ))}
            </ul>
          ) : (
            <p className="text-sm text-muted-foreground">No commitments extracted.</p>
          )}
        </section>
      </div>

      <section className="space-y-2">
        <SectionTitle>Notes</SectionTitle>
        {view.annotations.length === 0 ? (
          <div className="rounded-md border border-dashed border-border bg-background/70 p-3 text-sm text-muted-foreground">
            No notes on this email.
          </div>
        ) : (
          <ul className="space-y-2">
            {view.annotations.map((annotation) => {
              const author = annotation.labeler_id
                ? labelerNames.get(annotation.labeler_id) ?? annotation.labeler_id
                : "Unassigned";
              const own = annotation.annotation_id === view.ownAnnotation?.annotation_id;
              return (
                <li
                  key={annotation.annotation_id}
                  className={`flex items-start justify-between gap-3 rounded-md border px-3 py-2 text-sm ${
                    own ? "border-accent bg-accent/10" : "border-border bg-background/80"
                  }`}
                >
                  <div className="space-y-1">
                    <p className="text-[11px] font-semibold uppercase tracking-[0.2em] text-muted-foreground">
                      {author}
                    </p>
                    <p className="whitespace-pre-wrap text-foreground">{annotation.open_code}</p>
                  </div>
                  <button
                    type="button"
                    aria-label="Delete note"
                    disabled={disabled}
                    onClick={() => onDeleteAnnotation(annotation.annotation_id)}
                    className="inline-flex h-6 w-6 items-center justify-center rounded-md border border-border text-muted-foreground transition hover:border-danger hover:text-danger disabled:opacity-50"
                  >
                    <Trash2 className="h-3.5 w-3.5" />
                  </button>
                </li>
              );
            })}
          </ul>
        )}
      </section>

      <section className="space-y-2">
        <SectionTitle>Failure modes</SectionTitle>
        {view.attachedFailureModes.length === 0 ? (
          <p className="text-sm text-muted-foreground">No failure modes assigned.</p>
        ) : (
          <div className="flex flex-wrap gap-2">
            {view.attachedFailureModes.map((mode) => (
              <span
                key={`${mode.annotation_id}:${mode.failure_mode_id}`}
                title={mode.definition}
                className="inline-flex items-center gap-1 rounded-full border border-danger/30 bg-danger/10 px-2 py-0.5 text-xs font-medium text-danger"
              >
                {mode.display_name}
                <button
                  type="button"
                  aria-label={`Remove ${mode.display_name}`}
                  disabled={disabled}
                  onClick={() => onDetachFailureMode(mode.annotation_id, mode.failure_mode_id)}
                  className="rounded-full p-0.5 transition hover:bg-danger/20 disabled:opacity-50"
                >
                  <Link2Off className="h-3 w-3" />
                </button>
              </span>
            ))}
          </div>
        )}
      </section>
    </article>
  );
}
