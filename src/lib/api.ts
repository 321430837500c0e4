import type {
  Annotation,
  AxialLink,
  ContextResponse,
  CreatedLabeler,
  EmailPayload,
  FailureMode,
  FailureModeSuggestion,
  Judgment,
} from "@/lib/types";

export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export type NewAnnotationRequest = {
  email_hash: string;
  open_code: string;
  labeler_id: string;
  pass_fail?: boolean | null;
};

export type NewFailureModeRequest = {
  display_name: string;
  definition?: string;
  slug?: string;
};

/** Every call the workspace makes against the annotation backend. */
export interface AnnotationApi {
  getContext(runId?: string | null): Promise<ContextResponse>;
  createLabeler(name: string): Promise<CreatedLabeler>;
  getEmail(emailHash: string, labelerId: string | null): Promise<EmailPayload>;
  setJudgment(input: {
    email_hash: string;
    labeler_id: string;
    pass_fail: boolean;
  }): Promise<Judgment>;
  deleteJudgment(emailHash: string, labelerId: string): Promise<void>;
  createAnnotation(input: NewAnnotationRequest): Promise<Annotation>;
  updateAnnotation(annotationId: string, openCode: string): Promise<Annotation>;
  deleteAnnotation(annotationId: string): Promise<void>;
  createFailureMode(input: NewFailureModeRequest): Promise<FailureMode>;
  suggestFailureModes(emailHash: string): Promise<FailureModeSuggestion[]>;
  createAxialLink(annotationId: string, failureModeId: string): Promise<AxialLink>;
  deleteAxialLink(annotationId: string, failureModeId: string): Promise<void>;
}

type Fetcher = (input: string, init?: RequestInit) => Promise<Response>;

function readErrorField(text: string) {
  try {
    const parsed: unknown = JSON.parse(text);
    if (
      parsed &&
      typeof parsed === "object" &&
      "error" in parsed &&
      typeof parsed.error === "string" &&
      parsed.error
    ) {
      return parsed.error;
    }
    return null;
  } catch {
    return null;
  }
}

/** `{ "error": ... }` bodies yield their message; other bodies are used verbatim. */
export function errorMessage(status: number, bodyText: string) {
  const trimmed = bodyText.trim();
  if (!trimmed) {
    return `HTTP ${status}`;
  }
  return readErrorField(trimmed) ?? trimmed;
}

function query(params: Record<string, string | null | undefined>) {
  const search = new URLSearchParams();
  Object.entries(params).forEach(([key, value]) => {
    if (value) {
      search.set(key, value);
    }
  });
  const text = search.toString();
  return text ? `?${text}` : "";
}

export function createApiClient(fetcher: Fetcher = fetch, baseUrl = ""): AnnotationApi {
  async function fetchJSON<T>(path: string, init: RequestInit = {}): Promise<T> {
    const response = await fetcher(`${baseUrl}${path}`, {
      headers: { "Content-Type": "application/json" },
      ...init,
    });
    if (!response.ok) {
      throw new ApiError(response.status, errorMessage(response.status, await response.text()));
    }
    return (await response.json()) as T;
  }

  function send<T>(method: string, path: string, body?: unknown) {
    return fetchJSON<T>(path, {
      method,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  return {
    getContext: (runId) => fetchJSON(`/api/context${query({ run_id: runId })}`),
    createLabeler: (name) => send("POST", "/api/labelers", { name }),
    getEmail: (emailHash, labelerId) =>
      fetchJSON(
        `/api/email/${encodeURIComponent(emailHash)}${query({ labeler_id: labelerId })}`
      ),
    setJudgment: (input) => send("POST", "/api/judgments", input),
    deleteJudgment: async (emailHash, labelerId) => {
      await send(
        "DELETE",
        `/api/judgments${query({ email_hash: emailHash, labeler_id: labelerId })}`
      );
    },
    createAnnotation: (input) => send("POST", "/api/annotations", input),
    updateAnnotation: (annotationId, openCode) =>
      send("PUT", `/api/annotations/${encodeURIComponent(annotationId)}`, {
        open_code: openCode,
      }),
    deleteAnnotation: async (annotationId) => {
      await send("DELETE", `/api/annotations/${encodeURIComponent(annotationId)}`);
    },
    createFailureMode: (input) => send("POST", "/api/failure-modes", input),
    suggestFailureModes: async (emailHash) => {
      const data = await fetchJSON<{ suggestions?: FailureModeSuggestion[] }>(
        `/api/failure-modes/suggest${query({ email_hash: emailHash })}`
      );
      return data.suggestions ?? [];
    },
    createAxialLink: (annotationId, failureModeId) =>
      send("POST", "/api/axial-links", {
        annotation_id: annotationId,
        failure_mode_id: failureModeId,
      }),
    deleteAxialLink: async (annotationId, failureModeId) => {
      await send(
        "DELETE",
        `/api/axial-links${query({
          annotation_id: annotationId,
          failure_mode_id: failureModeId,
        })}`
      );
    },
  };
}
