import type { FailureModeSelection, Mutation } from "@/lib/mutations";
import { currentEmailHash, stepIndex, type SessionState } from "@/lib/session";
import { isWrittenNote } from "@/lib/suggestions";

export type Intent =
  | { kind: "advance" }
  | { kind: "retreat" }
  | { kind: "jumpToRun"; runId: string }
  | { kind: "selectLabeler"; labelerId: string | null }
  | { kind: "openNote" }
  | { kind: "openFailureMode" }
  | { kind: "judge"; pass: boolean }
  | { kind: "deleteJudgment" }
  | { kind: "saveNote"; text: string }
  | { kind: "deleteAnnotation"; annotationId: string }
  | { kind: "attachFailureMode"; selection: FailureModeSelection }
  | { kind: "detachFailureMode"; annotationId: string; failureModeId: string }
  | { kind: "createFailureMode"; displayName: string; definition: string }
  | { kind: "suggestFailureModes" };

export type Dialog = "note" | "failureMode";

export type Effect =
  | { kind: "none" }
  | { kind: "alert"; message: string }
  | { kind: "openDialog"; dialog: Dialog }
  | { kind: "loadContext"; runId: string | null }
  | { kind: "moveTo"; index: number }
  | { kind: "selectLabeler"; labelerId: string | null }
  | { kind: "mutate"; emailHash: string; mutation: Mutation; closeDialog?: Dialog }
  | { kind: "suggest"; emailHash: string };

export const messages = {
  noEmail: "No email is loaded.",
  noLabeler: "Select a labeler before annotating.",
  emptyNote: "Write a note before saving.",
  noJudgment: "Record a fail judgment before assigning failure modes.",
  passJudgment: "Failure modes only apply to emails judged as fail.",
  emptyFailureMode: "Choose a failure mode or enter a name for a new one.",
  noAnnotations: "Add a note before asking for suggestions.",
} as const;

const keyBindings: Record<string, Intent> = {
  arrowleft: { kind: "retreat" },
  h: { kind: "retreat" },
  arrowright: { kind: "advance" },
  l: { kind: "advance" },
  a: { kind: "openNote" },
  n: { kind: "openNote" },
  f: { kind: "openFailureMode" },
  z: { kind: "judge", pass: true },
  x: { kind: "judge", pass: false },
  d: { kind: "deleteJudgment" },
  s: { kind: "suggestFailureModes" },
};

const typingTags = new Set(["INPUT", "TEXTAREA", "SELECT"]);

export type KeyTarget = {
  tagName?: string;
  isContentEditable?: boolean;
};

export function isTypingTarget(target: KeyTarget | null) {
  if (!target) {
    return false;
  }
  return Boolean(target.isContentEditable) || typingTags.has((target.tagName ?? "").toUpperCase());
}

export type KeyPress = {
  key: string;
  ctrlKey?: boolean;
  metaKey?: boolean;
  altKey?: boolean;
};

/** Modified chords are left to the browser. */
export function intentForKey(press: KeyPress, typing: boolean): Intent | null {
  if (typing || press.ctrlKey || press.metaKey || press.altKey) {
    return null;
  }
  return keyBindings[press.key.toLowerCase()] ?? null;
}

type Target = { emailHash: string; labelerId: string };

function requireTarget(state: SessionState): Target | { kind: "alert"; message: string } {
  const emailHash = currentEmailHash(state);
  if (!emailHash || !state.view) {
    return { kind: "alert", message: messages.noEmail };
  }
  if (!state.labelerId) {
    return { kind: "alert", message: messages.noLabeler };
  }
  return { emailHash, labelerId: state.labelerId };
}

function failJudgmentGuard(state: SessionState): Effect | null {
  const judgment = state.view?.judgment;
  if (!judgment || judgment.kind === "none") {
    return { kind: "alert", message: messages.noJudgment };
  }
  if (judgment.kind === "pass") {
    return { kind: "alert", message: messages.passJudgment };
  }
  return null;
}

/**
 * Decides what an intent does against the current session. Guards resolve
 * here, so the shell only executes the returned effect.
 */
export function planIntent(state: SessionState, intent: Intent): Effect {
  switch (intent.kind) {
    case "advance":
    case "retreat": {
      const index = stepIndex(state, intent.kind === "advance" ? 1 : -1);
      return index === null ? { kind: "none" } : { kind: "moveTo", index };
    }
    case "jumpToRun":
      return { kind: "loadContext", runId: intent.runId.trim() || null };
    case "selectLabeler":
      return { kind: "selectLabeler", labelerId: intent.labelerId || null };
  }

  const target = requireTarget(state);
  if ("kind" in target) {
    return target;
  }
  const view = state.view;
  if (!view) {
    return { kind: "alert", message: messages.noEmail };
  }
  const { emailHash, labelerId } = target;

  switch (intent.kind) {
    case "openNote":
      return { kind: "openDialog", dialog: "note" };
    case "openFailureMode":
      return failJudgmentGuard(state) ?? { kind: "openDialog", dialog: "failureMode" };
    case "judge":
      return {
        kind: "mutate",
        emailHash,
        mutation: { kind: "setJudgment", emailHash, labelerId, pass: intent.pass },
      };
    case "deleteJudgment":
      if (view.judgment.kind === "none") {
        return { kind: "none" };
      }
      return { kind: "mutate", emailHash, mutation: { kind: "deleteJudgment", emailHash, labelerId } };
    case "saveNote": {
      const text = intent.text.trim();
      if (!text) {
        return { kind: "alert", message: messages.emptyNote };
      }
      return {
        kind: "mutate",
        emailHash,
        closeDialog: "note",
        mutation: {
          kind: "saveNote",
          emailHash,
          labelerId,
          text,
          annotationId: view.ownAnnotation?.annotation_id ?? null,
        },
      };
    }
    case "deleteAnnotation": {
      const known = view.annotations.some(
        (annotation) => annotation.annotation_id === intent.annotationId
      );
      return known
        ? {
            kind: "mutate",
            emailHash,
            mutation: { kind: "deleteAnnotation", annotationId: intent.annotationId },
          }
        : { kind: "none" };
    }
    case "attachFailureMode": {
      const blocked = failJudgmentGuard(state);
      if (blocked) {
        return blocked;
      }
      const selection = normalizeSelection(intent.selection);
      if (!selection) {
        return { kind: "alert", message: messages.emptyFailureMode };
      }
      return {
        kind: "mutate",
        emailHash,
        closeDialog: "failureMode",
        mutation: {
          kind: "attachFailureMode",
          emailHash,
          labelerId,
          annotationId: view.ownAnnotation?.annotation_id ?? null,
          selection,
        },
      };
    }
    case "detachFailureMode": {
      const linked = view.attachedFailureModes.some(
        (mode) =>
          mode.annotation_id === intent.annotationId &&
          mode.failure_mode_id === intent.failureModeId
      );
      return linked
        ? {
            kind: "mutate",
            emailHash,
            mutation: {
              kind: "detachFailureMode",
              annotationId: intent.annotationId,
              failureModeId: intent.failureModeId,
            },
          }
        : { kind: "none" };
    }
    case "createFailureMode": {
      const displayName = intent.displayName.trim();
      if (!displayName) {
        return { kind: "alert", message: messages.emptyFailureMode };
      }
      return {
        kind: "mutate",
        emailHash,
        mutation: { kind: "createFailureMode", displayName, definition: intent.definition.trim() },
      };
    }
    case "suggestFailureModes":
      return view.annotations.some((annotation) => isWrittenNote(annotation.open_code))
        ? { kind: "suggest", emailHash }
        : { kind: "alert", message: messages.noAnnotations };
  }
}

function normalizeSelection(selection: FailureModeSelection): FailureModeSelection | null {
  if (selection.kind === "existing") {
    return selection.failureModeId ? selection : null;
  }
  const displayName = selection.displayName.trim();
  if (!displayName) {
    return null;
  }
  return { ...selection, displayName, definition: selection.definition.trim() };
}
