import type {
  Annotation,
  AxialLink,
  Email,
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

export type MemorySeed = {
  runs: TraceRun[];
  emails: Email[];
  labelers?: Labeler[];
  failureModes?: FailureMode[];
};

type MemoryStoreOptions = {
  now?: () => string;
};

function judgmentKey(emailHash: string, labelerId: string) {
  return `${emailHash}::${labelerId}`;
}

function linkKey(annotationId: string, failureModeId: string) {
  return `${annotationId}::${failureModeId}`;
}

function byAscending<T>(pick: (item: T) => string) {
  return (a: T, b: T) => pick(a).localeCompare(pick(b));
}

function byDescending<T>(pick: (item: T) => string) {
  return (a: T, b: T) => pick(b).localeCompare(pick(a));
}

/**
 * In-process store with the same ordering and uniqueness rules as the
 * Postgres schema. Backs the demo workspace and the test suite.
 */
export class MemoryAnnotationStore implements AnnotationStore {
  private readonly runs = new Map<string, TraceRun>();
  private readonly emails = new Map<string, Email>();
  private readonly labelers = new Map<string, Labeler>();
  private readonly judgments = new Map<string, Judgment>();
  private readonly annotations = new Map<string, Annotation>();
  private readonly failureModes = new Map<string, FailureMode>();
  private readonly links = new Map<string, AxialLink>();
  private readonly now: () => string;

  constructor(seed?: MemorySeed, options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date().toISOString());
    seed?.runs.forEach((run) => this.runs.set(run.run_id, run));
    seed?.emails.forEach((email) => this.emails.set(email.email_hash, email));
    seed?.labelers?.forEach((labeler) =>
      this.labelers.set(labeler.labeler_id, labeler)
    );
    seed?.failureModes?.forEach((mode) =>
      this.failureModes.set(mode.failure_mode_id, mode)
    );
  }

  async getRun(runId: string) {
    return this.runs.get(runId) ?? null;
  }

  async getLatestRun() {
    const [latest] = [...this.runs.values()].sort(
      byDescending((run) => run.generated_at)
    );
    return latest ?? null;
  }

  async listEmailHashes(runId: string) {
    return [...this.emails.values()]
      .filter((email) => email.run_id === runId)
      .map((email) => email.email_hash)
      .sort();
  }

  async getEmail(emailHash: string) {
    return this.emails.get(emailHash) ?? null;
  }

  async listLabelers() {
    return [...this.labelers.values()].sort(
      byAscending((labeler) => labeler.created_at)
    );
  }

  async getLabeler(labelerId: string) {
    return this.labelers.get(labelerId) ?? null;
  }

  async insertLabeler(labeler: NewLabeler) {
    const row: Labeler = { ...labeler, created_at: this.now() };
    this.labelers.set(row.labeler_id, row);
    return row;
  }

  async getJudgment(emailHash: string, labelerId: string) {
    return this.judgments.get(judgmentKey(emailHash, labelerId)) ?? null;
  }

  async upsertJudgment(judgment: JudgmentUpsert) {
    const timestamp = this.now();
    const row: Judgment = {
      ...judgment,
      judged_at: timestamp,
      updated_at: timestamp,
    };
    this.judgments.set(judgmentKey(judgment.email_hash, judgment.labeler_id), row);
    return row;
  }

  async deleteJudgment(emailHash: string, labelerId: string) {
    return this.judgments.delete(judgmentKey(emailHash, labelerId));
  }

  async listAnnotations(emailHash: string) {
    return [...this.annotations.values()]
      .filter((annotation) => annotation.email_hash === emailHash)
      .sort(byDescending((annotation) => annotation.created_at));
  }

  async getAnnotation(annotationId: string) {
    return this.annotations.get(annotationId) ?? null;
  }

  async insertAnnotation(annotation: NewAnnotation) {
    const timestamp = this.now();
    const row: Annotation = {
      ...annotation,
      created_at: timestamp,
      updated_at: timestamp,
    };
    this.annotations.set(row.annotation_id, row);
    return row;
  }

  async updateAnnotationText(annotationId: string, openCode: string) {
    const existing = this.annotations.get(annotationId);
    if (!existing) {
      return null;
    }
    const row: Annotation = {
      ...existing,
      open_code: openCode,
      updated_at: this.now(),
    };
    this.annotations.set(annotationId, row);
    return row;
  }

  async deleteAnnotation(annotationId: string) {
    for (const [key, link] of this.links) {
      if (link.annotation_id === annotationId) {
        this.links.delete(key);
      }
    }
    return this.annotations.delete(annotationId);
  }

  async listFailureModes() {
    return [...this.failureModes.values()].sort(
      byAscending((mode) => mode.display_name)
    );
  }

  async getFailureMode(failureModeId: string) {
    return this.failureModes.get(failureModeId) ?? null;
  }

  async insertFailureMode(failureMode: NewFailureMode) {
    const row: FailureMode = { ...failureMode, created_at: this.now() };
    this.failureModes.set(row.failure_mode_id, row);
    return row;
  }

  async listAxialLinks(annotationIds: string[]) {
    const wanted = new Set(annotationIds);
    return [...this.links.values()]
      .filter((link) => wanted.has(link.annotation_id))
      .sort(byDescending((link) => link.linked_at));
  }

  async insertAxialLink(link: NewAxialLink) {
    const key = linkKey(link.annotation_id, link.failure_mode_id);
    const existing = this.links.get(key);
    if (existing) {
      return existing;
    }
    const row: AxialLink = { ...link, linked_at: this.now() };
    this.links.set(key, row);
    return row;
  }

  async deleteAxialLink(annotationId: string, failureModeId: string) {
    return this.links.delete(linkKey(annotationId, failureModeId));
  }
}
