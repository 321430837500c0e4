type ValidationResult<T> =
  | { value: T; error?: undefined }
  | { value?: undefined; error: string };

export type LabelerInput = {
  name: string;
  email: string | null;
  labeler_id: string | null;
};

export type JudgmentInput = {
  email_hash: string;
  labeler_id: string;
  pass_fail: boolean;
};

export type AnnotationInput = {
  email_hash: string;
  open_code: string;
  labeler_id: string | null;
  pass_fail: boolean | null;
};

export type FailureModeInput = {
  display_name: string;
  slug: string | null;
  definition: string;
  examples: string[];
};

export type AxialLinkInput = {
  annotation_id: string;
  failure_mode_id: string;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function trimmedString(value: unknown) {
  return typeof value === "string" ? value.trim() : "";
}

function optionalTrimmed(value: unknown) {
  const trimmed = trimmedString(value);
  return trimmed ? trimmed : null;
}

export function validateLabelerInput(body: unknown): ValidationResult<LabelerInput> {
  if (!isPlainObject(body)) {
    return { error: "Request body must be a JSON object." };
  }

  const name = trimmedString(body.name);
  if (!name) {
    return { error: "name is required" };
  }

  return {
    value: {
      name,
      email: optionalTrimmed(body.email),
      labeler_id: optionalTrimmed(body.labeler_id),
    },
  };
}

export function validateJudgmentInput(body: unknown): ValidationResult<JudgmentInput> {
  if (!isPlainObject(body)) {
    return { error: "Request body must be a JSON object." };
  }

  const emailHash = trimmedString(body.email_hash);
  const labelerId = trimmedString(body.labeler_id);
  if (!emailHash || !labelerId) {
    return { error: "email_hash and labeler_id are required" };
  }

  if (typeof body.pass_fail !== "boolean") {
    return { error: "pass_fail must be a boolean" };
  }

  return {
    value: { email_hash: emailHash, labeler_id: labelerId, pass_fail: body.pass_fail },
  };
}

export function validateAnnotationInput(
  body: unknown
): ValidationResult<AnnotationInput> {
  if (!isPlainObject(body)) {
    return { error: "Request body must be a JSON object." };
  }

  const emailHash = trimmedString(body.email_hash);
  const openCode = trimmedString(body.open_code);
  if (!emailHash || !openCode) {
    return { error: "email_hash and open_code are required" };
  }

  const passFail = body.pass_fail;
  if (passFail !== undefined && passFail !== null && typeof passFail !== "boolean") {
    return { error: "pass_fail must be a boolean or null" };
  }

  return {
    value: {
      email_hash: emailHash,
      open_code: openCode,
      labeler_id: optionalTrimmed(body.labeler_id),
      pass_fail: typeof passFail === "boolean" ? passFail : null,
    },
  };
}

export function validateAnnotationUpdate(
  body: unknown
): ValidationResult<{ open_code: string }> {
  if (!isPlainObject(body)) {
    return { error: "Request body must be a JSON object." };
  }

  const openCode = trimmedString(body.open_code);
  if (!openCode) {
    return { error: "open_code is required" };
  }

  return { value: { open_code: openCode } };
}

export function validateFailureModeInput(
  body: unknown
): ValidationResult<FailureModeInput> {
  if (!isPlainObject(body)) {
    return { error: "Request body must be a JSON object." };
  }

  const displayName = trimmedString(body.display_name);
  if (!displayName) {
    return { error: "display_name is required" };
  }

  if (body.examples !== undefined && !Array.isArray(body.examples)) {
    return { error: "examples must be a list of strings" };
  }

  const examples = Array.isArray(body.examples)
    ? body.examples
        .map((example) => trimmedString(example))
        .filter(Boolean)
    : [];

  return {
    value: {
      display_name: displayName,
      slug: optionalTrimmed(body.slug),
      definition: trimmedString(body.definition),
      examples,
    },
  };
}

export function validateAxialLinkInput(
  body: unknown
): ValidationResult<AxialLinkInput> {
  if (!isPlainObject(body)) {
    return { error: "Request body must be a JSON object." };
  }

  const annotationId = trimmedString(body.annotation_id);
  const failureModeId = trimmedString(body.failure_mode_id);
  if (!annotationId || !failureModeId) {
    return { error: "annotation_id and failure_mode_id are required" };
  }

  return { value: { annotation_id: annotationId, failure_mode_id: failureModeId } };
}
