import { describe, expect, it } from "vitest";
import {
  createAnnotation,
  createAxialLink,
  createFailureMode,
  createLabeler,
  deleteAnnotation,
  getContext,
  getEmailPayload,
  suggestForEmail,
  upsertJudgment,
} from "@/lib/annotation-service";
import { HttpError } from "@/lib/errors";
import { MemoryAnnotationStore } from "@/lib/store/memory";
import { PLACEHOLDER_OPEN_CODE } from "@/lib/suggestions";
import { testSeed, tickingClock } from "@/lib/testing/local-api";

function freshStore() {
  return new MemoryAnnotationStore(testSeed, { now: tickingClock() });
}

describe("getContext", () => {
  it("falls back to the latest run for an unknown id", async () => {
    const context = await getContext(freshStore(), "missing");

    expect(context).toEqual({ run_id: "run-a", email_hashes: ["hash-1", "hash-2"], labelers: [] });
  });

  it("fails when no runs are loaded", async () => {
    const empty = new MemoryAnnotationStore({ runs: [], emails: [] });

    await expect(getContext(empty, null)).rejects.toMatchObject({
      status: 400,
      message: "No trace runs loaded yet",
    });
  });

  it("lists labelers by creation time", async () => {
    const store = freshStore();
    await createLabeler(store, { name: "Ana", email: null, labeler_id: "lab-b" });
    await createLabeler(store, { name: "Bo", email: null, labeler_id: "lab-a" });

    expect((await getContext(store, null)).labelers).toEqual([
      ["lab-b", "Ana"],
      ["lab-a", "Bo"],
    ]);
  });
});

describe("labelers", () => {
  it("generates eight hex characters and rejects duplicates", async () => {
    const store = freshStore();
    const created = await createLabeler(store, { name: "Ana", email: null, labeler_id: null });

    expect(created.labeler_id).toMatch(/^[0-9a-f]{8}$/);
    await expect(
      createLabeler(store, { name: "Ana", email: null, labeler_id: created.labeler_id })
    ).rejects.toMatchObject({ status: 409 });
  });
});

describe("judgments and annotations", () => {
  it("stamps the email's run and keeps one judgment per labeler", async () => {
    const store = freshStore();
    await createLabeler(store, { name: "Ana", email: null, labeler_id: "lab-1" });

    await upsertJudgment(store, { email_hash: "hash-1", labeler_id: "lab-1", pass_fail: true });
    const latest = await upsertJudgment(store, {
      email_hash: "hash-1",
      labeler_id: "lab-1",
      pass_fail: false,
    });

    expect(latest).toMatchObject({ run_id: "run-a", pass_fail: false });
    expect((await getEmailPayload(store, "hash-1", "lab-1")).judgment).toEqual(latest);
    expect((await getEmailPayload(store, "hash-1", null)).judgment).toBeNull();
  });

  it("returns 404 for unknown emails and labelers", async () => {
    const store = freshStore();

    await expect(getEmailPayload(store, "nope", null)).rejects.toBeInstanceOf(HttpError);
    await expect(
      upsertJudgment(store, { email_hash: "hash-1", labeler_id: "ghost", pass_fail: true })
    ).rejects.toMatchObject({ status: 404, message: "Labeler not found" });
  });

  it("gives annotations a 32 character id", async () => {
    const annotation = await createAnnotation(freshStore(), {
      email_hash: "hash-2",
      open_code: "vague",
      labeler_id: null,
      pass_fail: null,
    });

    expect(annotation.annotation_id).toMatch(/^[0-9a-f]{32}$/);
    expect(annotation.run_id).toBe("run-a");
  });
});

describe("failure modes and links", () => {
  it("derives the slug and attaches through the annotation's run", async () => {
    const store = freshStore();
    const mode = await createFailureMode(store, {
      display_name: "Wrong Owner or Date",
      slug: null,
      definition: "",
      examples: [],
    });
    const annotation = await createAnnotation(store, {
      email_hash: "hash-1",
      open_code: "owner is wrong",
      labeler_id: null,
      pass_fail: false,
    });

    const link = await createAxialLink(store, {
      annotation_id: annotation.annotation_id,
      failure_mode_id: mode.failure_mode_id,
    });
    const again = await createAxialLink(store, {
      annotation_id: annotation.annotation_id,
      failure_mode_id: mode.failure_mode_id,
    });

    expect(mode.slug).toBe("wrong-owner-or-date");
    expect(mode.failure_mode_id).toMatch(/^[0-9a-f]{8}$/);
    expect(link.run_id).toBe("run-a");
    expect(again).toEqual(link);

    const payload = await getEmailPayload(store, "hash-1", null);
    expect(payload.failure_modes).toEqual([
      {
        failure_mode_id: mode.failure_mode_id,
        display_name: "Wrong Owner or Date",
        definition: "",
        annotation_id: annotation.annotation_id,
        labeler_id: null,
      },
    ]);
    expect(payload.available_failure_modes.map((item) => item.display_name)).toEqual([
      "Missed Commitment",
      "Wrong Owner or Date",
    ]);
  });

  it("rejects links to unknown rows", async () => {
    await expect(
      createAxialLink(freshStore(), { annotation_id: "nope", failure_mode_id: "fm-missed" })
    ).rejects.toMatchObject({ status: 404, message: "Annotation not found" });
  });

  it("cascades link removal when an annotation is deleted", async () => {
    const store = freshStore();
    const annotation = await createAnnotation(store, {
      email_hash: "hash-1",
      open_code: "missed it",
      labeler_id: null,
      pass_fail: null,
    });
    await createAxialLink(store, {
      annotation_id: annotation.annotation_id,
      failure_mode_id: "fm-missed",
    });

    expect(await deleteAnnotation(store, annotation.annotation_id)).toEqual({
      deleted: annotation.annotation_id,
      removed: true,
    });
    expect(await store.listAxialLinks([annotation.annotation_id])).toEqual([]);
  });
});

describe("suggestForEmail", () => {
  it("counts only notes a labeler wrote", async () => {
    const store = freshStore();
    for (const openCode of [PLACEHOLDER_OPEN_CODE, "deadline missing", "deadline slipped"]) {
      await createAnnotation(store, {
        email_hash: "hash-1",
        open_code: openCode,
        labeler_id: null,
        pass_fail: false,
      });
    }

    const suggestions = await suggestForEmail(store, "hash-1");

    expect(suggestions.map((suggestion) => suggestion.display_name)).toEqual([
      "Deadline",
      "Missing",
      "Slipped",
    ]);
  });
});
