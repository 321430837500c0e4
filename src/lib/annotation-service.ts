import { randomUUID } from "crypto";
import { HttpError } from "@/lib/errors";
import type { AnnotationStore } from "@/lib/store/types";
import { isWrittenNote, slugify, suggestFailureModes } from "@/lib/suggestions";
import type {
  Annotation,
  AttachedFailureMode,
  AxialLink,
  ContextResponse,
  CreatedLabeler,
  EmailPayload,
  FailureMode,
  FailureModeSuggestion,
  Judgment,
  LabelerPair,
} from "@/lib/types";
import type {
  AnnotationInput,
  AxialLinkInput,
  FailureModeInput,
  JudgmentInput,
  LabelerInput,
} from "@/lib/validation";

function hexId(length: number) {
  return randomUUID().replace(/-/g, "").slice(0, length);
}

async function resolveRunId(store: AnnotationStore, runId: string | null) {
  if (runId) {
    const run = await store.getRun(runId);
    if (run) {
      return run.run_id;
    }
  }
  const latest = await store.getLatestRun();
  return latest?.run_id ?? null;
}

async function requireEmail(store: AnnotationStore, emailHash: string) {
  const email = await store.getEmail(emailHash);
  if (!email) {
    throw new HttpError(404, "Email not found");
  }
  return email;
}

export async function getContext(
  store: AnnotationStore,
  requestedRunId: string | null
): Promise<ContextResponse> {
  const runId = await resolveRunId(store, requestedRunId);
  if (!runId) {
    throw new HttpError(400, "No trace runs loaded yet");
  }

  const [emailHashes, labelers] = await Promise.all([
    store.listEmailHashes(runId),
    store.listLabelers(),
  ]);

  return {
    run_id: runId,
    email_hashes: emailHashes,
    labelers: labelers.map(
      (labeler): LabelerPair => [labeler.labeler_id, labeler.name]
    ),
  };
}

async function listAttachedFailureModes(
  store: AnnotationStore,
  annotations: Annotation[],
  catalog: FailureMode[]
): Promise<AttachedFailureMode[]> {
  const links = await store.listAxialLinks(
    annotations.map((annotation) => annotation.annotation_id)
  );
  const modesById = new Map(catalog.map((mode) => [mode.failure_mode_id, mode]));
  const labelerByAnnotation = new Map(
    annotations.map((annotation) => [annotation.annotation_id, annotation.labeler_id])
  );

  return links.flatMap((link) => {
    const mode = modesById.get(link.failure_mode_id);
    if (!mode) {
      return [];
    }
    return [
      {
        failure_mode_id: mode.failure_mode_id,
        display_name: mode.display_name,
        definition: mode.definition,
        annotation_id: link.annotation_id,
        labeler_id: labelerByAnnotation.get(link.annotation_id) ?? null,
      },
    ];
  });
}

export async function getEmailPayload(
  store: AnnotationStore,
  emailHash: string,
  labelerId: string | null
): Promise<EmailPayload> {
  const email = await requireEmail(store, emailHash);
  const [judgment, annotations, catalog] = await Promise.all([
    labelerId ? store.getJudgment(emailHash, labelerId) : Promise.resolve(null),
    store.listAnnotations(emailHash),
    store.listFailureModes(),
  ]);
  const attached = await listAttachedFailureModes(store, annotations, catalog);

  return {
    email,
    judgment,
    annotations,
    available_failure_modes: catalog,
    failure_modes: attached,
  };
}

export async function createLabeler(
  store: AnnotationStore,
  input: LabelerInput
): Promise<CreatedLabeler> {
  const labelerId = input.labeler_id ?? hexId(8);
  if (await store.getLabeler(labelerId)) {
    throw new HttpError(409, `Labeler ${labelerId} already exists`);
  }
  const labeler = await store.insertLabeler({
    labeler_id: labelerId,
    name: input.name,
    email: input.email,
  });
  return { labeler_id: labeler.labeler_id, name: labeler.name, email: labeler.email };
}

export async function upsertJudgment(
  store: AnnotationStore,
  input: JudgmentInput
): Promise<Judgment> {
  const email = await requireEmail(store, input.email_hash);
  if (!(await store.getLabeler(input.labeler_id))) {
    throw new HttpError(404, "Labeler not found");
  }
  return store.upsertJudgment({
    email_hash: email.email_hash,
    labeler_id: input.labeler_id,
    pass_fail: input.pass_fail,
    run_id: email.run_id,
  });
}

export async function deleteJudgment(
  store: AnnotationStore,
  emailHash: string,
  labelerId: string
) {
  const deleted = await store.deleteJudgment(emailHash, labelerId);
  return { deleted };
}

export async function createAnnotation(
  store: AnnotationStore,
  input: AnnotationInput
): Promise<Annotation> {
  const email = await requireEmail(store, input.email_hash);
  if (input.labeler_id && !(await store.getLabeler(input.labeler_id))) {
    throw new HttpError(404, "Labeler not found");
  }
  return store.insertAnnotation({
    annotation_id: hexId(32),
    email_hash: email.email_hash,
    labeler_id: input.labeler_id,
    open_code: input.open_code,
    pass_fail: input.pass_fail,
    run_id: email.run_id,
  });
}

export async function updateAnnotation(
  store: AnnotationStore,
  annotationId: string,
  openCode: string
): Promise<Annotation> {
  const updated = await store.updateAnnotationText(annotationId, openCode);
  if (!updated) {
    throw new HttpError(404, "Annotation not found");
  }
  return updated;
}

export async function deleteAnnotation(store: AnnotationStore, annotationId: string) {
  const deleted = await store.deleteAnnotation(annotationId);
  return { deleted: annotationId, removed: deleted };
}

export async function createFailureMode(
  store: AnnotationStore,
  input: FailureModeInput
): Promise<FailureMode> {
  return store.insertFailureMode({
    failure_mode_id: hexId(8),
    slug: input.slug ?? slugify(input.display_name),
    display_name: input.display_name,
    definition: input.definition,
    examples: input.examples,
  });
}

export async function suggestForEmail(
  store: AnnotationStore,
  emailHash: string
): Promise<FailureModeSuggestion[]> {
  const annotations = await store.listAnnotations(emailHash);
  return suggestFailureModes(
    annotations.map((annotation) => annotation.open_code).filter(isWrittenNote)
  );
}

export async function createAxialLink(
  store: AnnotationStore,
  input: AxialLinkInput
): Promise<AxialLink> {
  const annotation = await store.getAnnotation(input.annotation_id);
  if (!annotation) {
    throw new HttpError(404, "Annotation not found");
  }
  if (!(await store.getFailureMode(input.failure_mode_id))) {
    throw new HttpError(404, "Failure mode not found");
  }
  return store.insertAxialLink({
    annotation_id: annotation.annotation_id,
    failure_mode_id: input.failure_mode_id,
    run_id: annotation.run_id,
  });
}

export async function deleteAxialLink(
  store: AnnotationStore,
  annotationId: string,
  failureModeId: string
) {
  const removed = await store.deleteAxialLink(annotationId, failureModeId);
  return { removed };
}
