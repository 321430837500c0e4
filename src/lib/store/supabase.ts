import type { SupabaseClient } from "@supabase/supabase-js";
import type {
  Annotation,
  AxialLink,
  Email,
  EmailMetadata,
  FailureMode,
  Judgment,
  Labeler,
  TraceRun,
} from "@/lib/types";
import type {
  AnnotationStore,
  JudgmentUpsert,
  NewAnnotation,
  NewAxialLink,
  NewFailureMode,
  NewLabeler,
} from "@/lib/store/types";

type PostgrestFailure = { message: string } | null;

type EmailRow = Omit<Email, "metadata"> & { metadata: EmailMetadata | null };

type FailureModeRow = Omit<FailureMode, "examples" | "definition"> & {
  definition: string | null;
  examples: unknown;
};

const FAILURE_MODE_COLUMNS =
  "failure_mode_id, slug, display_name, definition, examples, created_at";

function fail(operation: string, error: PostgrestFailure): never {
  throw new Error(`${operation}: ${error?.message ?? "unknown error"}`);
}

function toEmail(row: EmailRow): Email {
  return { ...row, metadata: row.metadata ?? {} };
}

function toFailureMode(row: FailureModeRow): FailureMode {
  return {
    ...row,
    definition: row.definition ?? "",
    examples: Array.isArray(row.examples)
      ? row.examples.filter((item): item is string => typeof item === "string")
      : [],
  };
}

/**
 * Annotation tables over Supabase/Postgres. Uniqueness of judgments and axial
 * links is carried by the primary keys in the migration; upserts lean on them.
 */
export class SupabaseAnnotationStore implements AnnotationStore {
  constructor(private readonly client: SupabaseClient) {}

  async getRun(runId: string) {
    const { data, error } = await this.client
      .from("trace_runs")
      .select("*")
      .eq("run_id", runId)
      .maybeSingle();
    if (error) fail("getRun", error);
    return (data ?? null) as TraceRun | null;
  }

  async getLatestRun() {
    const { data, error } = await this.client
      .from("trace_runs")
      .select("*")
      .order("generated_at", { ascending: false })
      .limit(1)
      .maybeSingle();
    if (error) fail("getLatestRun", error);
    return (data ?? null) as TraceRun | null;
  }

  async listEmailHashes(runId: string) {
    const { data, error } = await this.client
      .from("emails_raw")
      .select("email_hash")
      .eq("run_id", runId)
      .order("email_hash", { ascending: true });
    if (error) fail("listEmailHashes", error);
    return ((data ?? []) as Array<{ email_hash: string }>).map(
      (row) => row.email_hash
    );
  }

  async getEmail(emailHash: string) {
    const { data, error } = await this.client
      .from("emails_raw")
      .select("*")
      .eq("email_hash", emailHash)
      .maybeSingle();
    if (error) fail("getEmail", error);
    return data ? toEmail(data as EmailRow) : null;
  }

  async listLabelers() {
    const { data, error } = await this.client
      .from("labelers")
      .select("*")
      .order("created_at", { ascending: true });
    if (error) fail("listLabelers", error);
    return (data ?? []) as Labeler[];
  }

  async getLabeler(labelerId: string) {
    const { data, error } = await this.client
      .from("labelers")
      .select("*")
      .eq("labeler_id", labelerId)
      .maybeSingle();
    if (error) fail("getLabeler", error);
    return (data ?? null) as Labeler | null;
  }

  async insertLabeler(labeler: NewLabeler) {
    const { data, error } = await this.client
      .from("labelers")
      .insert(labeler)
      .select("*")
      .single();
    if (error || !data) fail("insertLabeler", error);
    return data as Labeler;
  }

  async getJudgment(emailHash: string, labelerId: string) {
    const { data, error } = await this.client
      .from("email_judgments")
      .select("*")
      .eq("email_hash", emailHash)
      .eq("labeler_id", labelerId)
      .maybeSingle();
    if (error) fail("getJudgment", error);
    return (data ?? null) as Judgment | null;
  }

  async upsertJudgment(judgment: JudgmentUpsert) {
    const timestamp = new Date().toISOString();
    const { data, error } = await this.client
      .from("email_judgments")
      .upsert(
        { ...judgment, judged_at: timestamp, updated_at: timestamp },
        { onConflict: "email_hash,labeler_id" }
      )
      .select("*")
      .single();
    if (error || !data) fail("upsertJudgment", error);
    return data as Judgment;
  }

  async deleteJudgment(emailHash: string, labelerId: string) {
    const { data, error } = await this.client
      .from("email_judgments")
      .delete()
      .eq("email_hash", emailHash)
      .eq("labeler_id", labelerId)
      .select("email_hash");
    if (error) fail("deleteJudgment", error);
    return (data ?? []).length > 0;
  }

  async listAnnotations(emailHash: string) {
    const { data, error } = await this.client
      .from("annotations")
      .select("*")
      .eq("email_hash", emailHash)
      .order("created_at", { ascending: false });
    if (error) fail("listAnnotations", error);
    return (data ?? []) as Annotation[];
  }

  async getAnnotation(annotationId: string) {
    const { data, error } = await this.client
      .from("annotations")
      .select("*")
      .eq("annotation_id", annotationId)
      .maybeSingle();
    if (error) fail("getAnnotation", error);
    return (data ?? null) as Annotation | null;
  }

  async insertAnnotation(annotation: NewAnnotation) {
    const timestamp = new Date().toISOString();
    const { data, error } = await this.client
      .from("annotations")
      .insert({ ...annotation, created_at: timestamp, updated_at: timestamp })
      .select("*")
      .single();
    if (error || !data) fail("insertAnnotation", error);
    return data as Annotation;
  }

  async updateAnnotationText(annotationId: string, openCode: string) {
    const { data, error } = await this.client
      .from("annotations")
      .update({ open_code: openCode, updated_at: new Date().toISOString() })
      .eq("annotation_id", annotationId)
      .select("*")
      .maybeSingle();
    if (error) fail("updateAnnotationText", error);
    return (data ?? null) as Annotation | null;
  }

  async deleteAnnotation(annotationId: string) {
    const links = await this.client
      .from("axial_links")
      .delete()
      .eq("annotation_id", annotationId);
    if (links.error) fail("deleteAnnotation", links.error);

    const { data, error } = await this.client
      .from("annotations")
      .delete()
      .eq("annotation_id", annotationId)
      .select("annotation_id");
    if (error) fail("deleteAnnotation", error);
    return (data ?? []).length > 0;
  }

  async listFailureModes() {
    const { data, error } = await this.client
      .from("failure_modes")
      .select(FAILURE_MODE_COLUMNS)
      .order("display_name", { ascending: true });
    if (error) fail("listFailureModes", error);
    return ((data ?? []) as FailureModeRow[]).map(toFailureMode);
  }

  async getFailureMode(failureModeId: string) {
    const { data, error } = await this.client
      .from("failure_modes")
      .select(FAILURE_MODE_COLUMNS)
      .eq("failure_mode_id", failureModeId)
      .maybeSingle();
    if (error) fail("getFailureMode", error);
    return data ? toFailureMode(data as FailureModeRow) : null;
  }

  async insertFailureMode(failureMode: NewFailureMode) {
    const { data, error } = await this.client
      .from("failure_modes")
      .insert(failureMode)
      .select(FAILURE_MODE_COLUMNS)
      .single();
    if (error || !data) fail("insertFailureMode", error);
    return toFailureMode(data as FailureModeRow);
  }

  async listAxialLinks(annotationIds: string[]) {
    if (annotationIds.length === 0) {
      return [];
    }
    const { data, error } = await this.client
      .from("axial_links")
      .select("*")
      .in("annotation_id", annotationIds)
      .order("linked_at", { ascending: false });
    if (error) fail("listAxialLinks", error);
    return (data ?? []) as AxialLink[];
  }

  async insertAxialLink(link: NewAxialLink) {
    const inserted = await this.client
      .from("axial_links")
      .upsert(link, {
        onConflict: "annotation_id,failure_mode_id",
        ignoreDuplicates: true,
      });
    if (inserted.error) fail("insertAxialLink", inserted.error);

    const { data, error } = await this.client
      .from("axial_links")
      .select("*")
      .eq("annotation_id", link.annotation_id)
      .eq("failure_mode_id", link.failure_mode_id)
      .single();
    if (error || !data) fail("insertAxialLink", error);
    return data as AxialLink;
  }

  async deleteAxialLink(annotationId: string, failureModeId: string) {
    const { data, error } = await this.client
      .from("axial_links")
      .delete()
      .eq("annotation_id", annotationId)
      .eq("failure_mode_id", failureModeId)
      .select("annotation_id");
    if (error) fail("deleteAxialLink", error);
    return (data ?? []).length > 0;
  }
}
