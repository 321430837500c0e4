import * as service from "@/lib/annotation-service";
import { ApiError, type AnnotationApi } from "@/lib/api";
import { HttpError } from "@/lib/errors";
import { requireValid } from "@/lib/http";
import { MemoryAnnotationStore, type MemorySeed } from "@/lib/store/memory";
import {
  validateAnnotationInput,
  validateAnnotationUpdate,
  validateAxialLinkInput,
  validateFailureModeInput,
  validateJudgmentInput,
  validateLabelerInput,
} from "@/lib/validation";

export type LocalApi = AnnotationApi & {
  store: MemoryAnnotationStore;
  /** Method names in call order. */
  calls: string[];
};

async function settle<T>(task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof HttpError) {
      throw new ApiError(error.status, error.message);
    }
    throw error;
  }
}

/** Demo run with two emails and a small failure-mode catalogue. */
export const testSeed: MemorySeed = {
  runs: [
    {
      run_id: "run-a",
      prompt_path: null,
      prompt_checksum: null,
      source_csv: null,
      model_name: "test-model",
      generated_at: "2026-01-01T00:00:00.000Z",
    },
    {
      run_id: "run-empty",
      prompt_path: null,
      prompt_checksum: null,
      source_csv: null,
      model_name: null,
      generated_at: "2025-12-01T00:00:00.000Z",
    },
  ],
  emails: [
    {
      email_hash: "hash-1",
      subject: "Budget sync",
      body: "Please send the numbers.\n> Earlier thread",
      metadata: { from_email: "a@example.com", summary: "Asks for numbers." },
      run_id: "run-a",
      ingested_at: "2026-01-01T00:00:00.000Z",
    },
    {
      email_hash: "hash-2",
      subject: null,
      body: null,
      metadata: {},
      run_id: "run-a",
      ingested_at: "2026-01-01T00:00:00.000Z",
    },
  ],
  labelers: [],
  failureModes: [
    {
      failure_mode_id: "fm-missed",
      slug: "missed-commitment",
      display_name: "Missed Commitment",
      definition: "A commitment is missing.",
      examples: [],
      created_at: "2026-01-01T00:00:00.000Z",
    },
  ],
};

/** Monotonic clock so ordering by timestamp is deterministic. */
export function tickingClock(start = Date.parse("2026-02-01T00:00:00.000Z")) {
  let tick = 0;
  return () => new Date(start + 1000 * tick++).toISOString();
}

export function createLocalApi(seed: MemorySeed = testSeed): LocalApi {
  const store = new MemoryAnnotationStore(seed, { now: tickingClock() });
  const calls: string[] = [];

  function track<T>(name: string, task: () => Promise<T>) {
    calls.push(name);
    return settle(task);
  }

  return {
    store,
    calls,
    getContext: (runId) => track("getContext", () => service.getContext(store, runId ?? null)),
    createLabeler: (name) =>
      track("createLabeler", () =>
        service.createLabeler(store, requireValid(validateLabelerInput({ name })))
      ),
    getEmail: (emailHash, labelerId) =>
      track("getEmail", () => service.getEmailPayload(store, emailHash, labelerId)),
    setJudgment: (input) =>
      track("setJudgment", () =>
        service.upsertJudgment(store, requireValid(validateJudgmentInput(input)))
      ),
    deleteJudgment: (emailHash, labelerId) =>
      track("deleteJudgment", async () => {
        await service.deleteJudgment(store, emailHash, labelerId);
      }),
    createAnnotation: (input) =>
      track("createAnnotation", () =>
        service.createAnnotation(store, requireValid(validateAnnotationInput(input)))
      ),
    updateAnnotation: (annotationId, openCode) =>
      track("updateAnnotation", () =>
        service.updateAnnotation(
          store,
          annotationId,
          requireValid(validateAnnotationUpdate({ open_code: openCode })).open_code
        )
      ),
    deleteAnnotation: (annotationId) =>
      track("deleteAnnotation", async () => {
        await service.deleteAnnotation(store, annotationId);
      }),
    createFailureMode: (input) =>
      track("createFailureMode", () =>
        service.createFailureMode(store, requireValid(validateFailureModeInput(input)))
      ),
    suggestFailureModes: (emailHash) =>
      track("suggestFailureModes", () => service.suggestForEmail(store, emailHash)),
    createAxialLink: (annotationId, failureModeId) =>
      track("createAxialLink", () =>
        service.createAxialLink(
          store,
          requireValid(
            validateAxialLinkInput({
              annotation_id: annotationId,
              failure_mode_id: failureModeId,
            })
          )
        )
      ),
    deleteAxialLink: (annotationId, failureModeId) =>
      track("deleteAxialLink", async () => {
        await service.deleteAxialLink(store, annotationId, failureModeId);
      }),
  };
}
