import type { AnnotationApi } from "@/lib/api";
import type { ContextResponse } from "@/lib/types";

export type ContextLoadResult =
  | { status: "ready"; context: ContextResponse }
  | { status: "needs-labeler"; context: ContextResponse };

/**
 * Fetches the run scope. An empty roster is reported rather than resolved
 * here; the caller decides how to collect the first labeler's name.
 */
export async function loadContext(
  api: AnnotationApi,
  runId: string | null = null
): Promise<ContextLoadResult> {
  const context = await api.getContext(runId);
  const normalized: ContextResponse = {
    run_id: context.run_id,
    email_hashes: context.email_hashes ?? [],
    labelers: context.labelers ?? [],
  };
  return normalized.labelers.length === 0
    ? { status: "needs-labeler", context: normalized }
    : { status: "ready", context: normalized };
}

export type LabelerSetupOutcome =
  | { status: "created"; labeler: { labeler_id: string; name: string } }
  | { status: "declined" };

/** Creates the first labeler from an operator-supplied name, if any. */
export async function provisionLabeler(
  api: AnnotationApi,
  name: string | null
): Promise<LabelerSetupOutcome> {
  const trimmed = name?.trim() ?? "";
  if (!trimmed) {
    return { status: "declined" };
  }
  const created = await api.createLabeler(trimmed);
  return {
    status: "created",
    labeler: { labeler_id: created.labeler_id, name: created.name },
  };
}
