export type Json =
  | string
  | number
  | boolean
  | null
  | { [key: string]: Json | undefined }
  | Json[];

export type EmailMetadata = {
  from_email?: string | null;
  from_raw?: string | null;
  to_emails?: string | string[] | null;
  to_raw?: string | null;
  cc_emails?: string | string[] | null;
  cc_raw?: string | null;
  date_raw?: string | null;
  summary?: string | null;
  commitments?: string[] | null;
  [key: string]: Json | undefined;
};

export type Labeler = {
  labeler_id: string;
  name: string;
  email: string | null;
  created_at: string;
};

/** Roster entries travel as `[labeler_id, name]` pairs. */
export type LabelerPair = [string, string];

export type TraceRun = {
  run_id: string;
  prompt_path: string | null;
  prompt_checksum: string | null;
  source_csv: string | null;
  model_name: string | null;
  generated_at: string;
};

export type Email = {
  email_hash: string;
  subject: string | null;
  body: string | null;
  metadata: EmailMetadata;
  run_id: string;
  ingested_at: string;
};

export type Judgment = {
  email_hash: string;
  labeler_id: string;
  pass_fail: boolean;
  run_id: string;
  judged_at: string;
  updated_at: string;
};

export type Annotation = {
  annotation_id: string;
  email_hash: string;
  labeler_id: string | null;
  open_code: string;
  pass_fail: boolean | null;
  run_id: string;
  created_at: string;
  updated_at: string;
};

export type FailureMode = {
  failure_mode_id: string;
  slug: string;
  display_name: string;
  definition: string;
  examples: string[];
  created_at: string;
};

export type AxialLink = {
  annotation_id: string;
  failure_mode_id: string;
  run_id: string;
  linked_at: string;
};

/** A failure mode linked to one of the email's annotations. */
export type AttachedFailureMode = {
  failure_mode_id: string;
  display_name: string;
  definition: string;
  annotation_id: string;
  labeler_id: string | null;
};

export type FailureModeSuggestion = {
  display_name: string;
  slug: string;
  definition: string;
};

export type ContextResponse = {
  run_id: string;
  email_hashes: string[];
  labelers: LabelerPair[];
};

export type EmailPayload = {
  email: Email;
  judgment: Judgment | null;
  annotations: Annotation[];
  available_failure_modes: FailureMode[];
  failure_modes: AttachedFailureMode[];
};

export type CreatedLabeler = {
  labeler_id: string;
  name: string;
  email: string | null;
};
