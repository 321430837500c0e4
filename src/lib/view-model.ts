import type {
  Annotation,
  AttachedFailureMode,
  EmailMetadata,
  EmailPayload,
  FailureMode,
  Json,
} from "@/lib/types";

export type BodyLine = {
  kind: "text" | "quote";
  text: string;
};

export type MetadataChip = {
  label: string;
  value: string;
};

export type JudgmentState =
  | { kind: "none" }
  | { kind: "pass" | "fail"; at: string };

export type Tint = "pass" | "fail" | "none";

export type EmailViewModel = {
  emailHash: string;
  runId: string;
  subject: string;
  chips: MetadataChip[];
  body: BodyLine[];
  summary: string | null;
  commitments: string[];
  judgment: JudgmentState;
  tint: Tint;
  annotations: Annotation[];
  /** The active labeler's note; edits and failure-mode links hang off it. */
  ownAnnotation: Annotation | null;
  attachedFailureModes: AttachedFailureMode[];
  availableFailureModes: FailureMode[];
};

/** First candidate that is neither null nor undefined, in list order. */
export function firstPresent<T>(candidates: Array<T | null | undefined>): T | null {
  for (const candidate of candidates) {
    if (candidate !== null && candidate !== undefined) {
      return candidate;
    }
  }
  return null;
}

/** Non-blank text from a metadata value; string lists are joined. */
export function metadataText(value: Json | undefined): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (Array.isArray(value)) {
    const parts = value
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter(Boolean);
    return parts.length > 0 ? parts.join(", ") : null;
  }
  return null;
}

const chipSources: Array<{ label: string; keys: string[] }> = [
  { label: "From", keys: ["from_email", "from_raw"] },
  { label: "To", keys: ["to_emails", "to_raw"] },
  { label: "Cc", keys: ["cc_emails", "cc_raw"] },
  { label: "Date", keys: ["date_raw"] },
];

/**
 * Structured header fields win over the raw header text they were parsed
 * from. A chip with nothing to show is dropped.
 */
export function resolveMetadataChips(metadata: EmailMetadata): MetadataChip[] {
  return chipSources.flatMap(({ label, keys }) => {
    const value = firstPresent(keys.map((key) => metadataText(metadata[key])));
    return value === null ? [] : [{ label, value }];
  });
}

export function formatBody(body: string): BodyLine[] {
  return body.split(/\r?\n/).map((line): BodyLine => ({
    kind: line.startsWith(">") ? "quote" : "text",
    text: line,
  }));
}

function commitmentsOf(metadata: EmailMetadata) {
  const value = metadata.commitments;
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function project(
  payload: EmailPayload,
  labelerId: string | null
): EmailViewModel {
  const { email, judgment } = payload;
  const metadata = email.metadata;
  const verdict = judgment ? (judgment.pass_fail ? "pass" : "fail") : null;
  const ownAnnotation = labelerId
    ? payload.annotations.find((annotation) => annotation.labeler_id === labelerId) ??
      null
    : null;

  return {
    emailHash: email.email_hash,
    runId: email.run_id,
    subject: email.subject?.trim() || "(no subject)",
    chips: resolveMetadataChips(metadata),
    body: formatBody(email.body ?? ""),
    summary: metadataText(metadata.summary),
    commitments: commitmentsOf(metadata),
    judgment:
      judgment && verdict ? { kind: verdict, at: judgment.updated_at } : { kind: "none" },
    tint: verdict ?? "none",
    annotations: payload.annotations,
    ownAnnotation,
    attachedFailureModes: payload.failure_modes,
    availableFailureModes: payload.available_failure_modes,
  };
}
