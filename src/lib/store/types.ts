import type {
  Annotation,
  AxialLink,
  Email,
  FailureMode,
  Judgment,
  Labeler,
  TraceRun,
} from "@/lib/types";

export type NewLabeler = {
  labeler_id: string;
  name: string;
  email: string | null;
};

export type JudgmentUpsert = {
  email_hash: string;
  labeler_id: string;
  pass_fail: boolean;
  run_id: string;
};

export type NewAnnotation = {
  annotation_id: string;
  email_hash: string;
  labeler_id: string | null;
  open_code: string;
  pass_fail: boolean | null;
  run_id: string;
};

export type NewFailureMode = {
  failure_mode_id: string;
  slug: string;
  display_name: string;
  definition: string;
  examples: string[];
};

export type NewAxialLink = {
  annotation_id: string;
  failure_mode_id: string;
  run_id: string;
};

/**
 * Persistence seam for the annotation tables. Implemented over Supabase for
 * real deployments and in memory for the demo workspace and tests.
 */
export interface AnnotationStore {
  getRun(runId: string): Promise<TraceRun | null>;
  getLatestRun(): Promise<TraceRun | null>;
  listEmailHashes(runId: string): Promise<string[]>;
  getEmail(emailHash: string): Promise<Email | null>;

  listLabelers(): Promise<Labeler[]>;
  getLabeler(labelerId: string): Promise<Labeler | null>;
  insertLabeler(labeler: NewLabeler): Promise<Labeler>;

  getJudgment(emailHash: string, labelerId: string): Promise<Judgment | null>;
  upsertJudgment(judgment: JudgmentUpsert): Promise<Judgment>;
  /** Returns whether a row was removed. */
  deleteJudgment(emailHash: string, labelerId: string): Promise<boolean>;

  listAnnotations(emailHash: string): Promise<Annotation[]>;
  getAnnotation(annotationId: string): Promise<Annotation | null>;
  insertAnnotation(annotation: NewAnnotation): Promise<Annotation>;
  updateAnnotationText(
    annotationId: string,
    openCode: string
  ): Promise<Annotation | null>;
  /** Removes the annotation together with its axial links. */
  deleteAnnotation(annotationId: string): Promise<boolean>;

  listFailureModes(): Promise<FailureMode[]>;
  getFailureMode(failureModeId: string): Promise<FailureMode | null>;
  insertFailureMode(failureMode: NewFailureMode): Promise<FailureMode>;

  listAxialLinks(annotationIds: string[]): Promise<AxialLink[]>;
  /** Inserting an existing (annotation, failure mode) pair keeps the stored row. */
  insertAxialLink(link: NewAxialLink): Promise<AxialLink>;
  deleteAxialLink(annotationId: string, failureModeId: string): Promise<boolean>;
}
