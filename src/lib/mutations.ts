import type { AnnotationApi } from "@/lib/api";
import { PLACEHOLDER_OPEN_CODE } from "@/lib/suggestions";
import type { FailureModeSuggestion } from "@/lib/types";
import { project, type EmailViewModel } from "@/lib/view-model";

export type FailureModeSelection =
  | { kind: "existing"; failureModeId: string }
  | { kind: "new"; displayName: string; definition: string; slug?: string };

export type Mutation =
  | { kind: "setJudgment"; emailHash: string; labelerId: string; pass: boolean }
  | { kind: "deleteJudgment"; emailHash: string; labelerId: string }
  | {
      kind: "saveNote";
      emailHash: string;
      labelerId: string;
      text: string;
      annotationId: string | null;
    }
  | { kind: "deleteAnnotation"; annotationId: string }
  | {
      kind: "attachFailureMode";
      emailHash: string;
      labelerId: string;
      annotationId: string | null;
      selection: FailureModeSelection;
    }
  | { kind: "detachFailureMode"; annotationId: string; failureModeId: string }
  | { kind: "createFailureMode"; displayName: string; definition: string };

async function resolveFailureModeId(api: AnnotationApi, selection: FailureModeSelection) {
  if (selection.kind === "existing") {
    return selection.failureModeId;
  }
  const created = await api.createFailureMode({
    display_name: selection.displayName,
    definition: selection.definition,
    ...(selection.slug ? { slug: selection.slug } : {}),
  });
  return created.failure_mode_id;
}

/**
 * Issues the writes for one mutation. The caller reloads the email afterwards;
 * nothing here touches client state.
 */
export async function runMutation(api: AnnotationApi, mutation: Mutation): Promise<void> {
  switch (mutation.kind) {
    case "setJudgment":
      await api.setJudgment({
        email_hash: mutation.emailHash,
        labeler_id: mutation.labelerId,
        pass_fail: mutation.pass,
      });
      return;
    case "deleteJudgment":
      await api.deleteJudgment(mutation.emailHash, mutation.labelerId);
      return;
    case "saveNote":
      if (mutation.annotationId) {
        await api.updateAnnotation(mutation.annotationId, mutation.text);
      } else {
        await api.createAnnotation({
          email_hash: mutation.emailHash,
          open_code: mutation.text,
          labeler_id: mutation.labelerId,
        });
      }
      return;
    case "deleteAnnotation":
      await api.deleteAnnotation(mutation.annotationId);
      return;
    case "attachFailureMode": {
      const anchorId =
        mutation.annotationId ??
        (
          await api.createAnnotation({
            email_hash: mutation.emailHash,
            open_code: PLACEHOLDER_OPEN_CODE,
            labeler_id: mutation.labelerId,
          })
        ).annotation_id;
      const failureModeId = await resolveFailureModeId(api, mutation.selection);
      await api.createAxialLink(anchorId, failureModeId);
      return;
    }
    case "detachFailureMode":
      await api.deleteAxialLink(mutation.annotationId, mutation.failureModeId);
      return;
    case "createFailureMode":
      await api.createFailureMode({
        display_name: mutation.displayName,
        definition: mutation.definition,
      });
      return;
  }
}

export async function reloadEmail(
  api: AnnotationApi,
  emailHash: string,
  labelerId: string | null
): Promise<EmailViewModel> {
  return project(await api.getEmail(emailHash, labelerId), labelerId);
}

export type SuggestionOutcome =
  | { status: "empty" }
  | { status: "declined"; suggestions: FailureModeSuggestion[] }
  | { status: "accepted"; suggestions: FailureModeSuggestion[]; selection: FailureModeSelection };

/**
 * Fetches suggestions and asks the operator whether to adopt the top one.
 * An accepted suggestion comes back as a new-failure-mode selection for the
 * regular attach flow.
 */
export async function requestSuggestion(
  api: AnnotationApi,
  emailHash: string,
  confirm: (message: string) => boolean
): Promise<SuggestionOutcome> {
  const suggestions = await api.suggestFailureModes(emailHash);
  const [top] = suggestions;
  if (!top) {
    return { status: "empty" };
  }

  const names = suggestions.map((suggestion) => suggestion.display_name).join(", ");
  if (!confirm(`Suggestions: ${names}. Add the first one?`)) {
    return { status: "declined", suggestions };
  }

  return {
    status: "accepted",
    suggestions,
    selection: {
      kind: "new",
      displayName: top.display_name,
      definition: top.definition,
      slug: top.slug,
    },
  };
}
