import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DELETE as deleteAxialLink } from "@/app/api/axial-links/route";
import { POST as createFailureMode } from "@/app/api/failure-modes/route";
import { DELETE as deleteJudgment, POST as postJudgment } from "@/app/api/judgments/route";
import { POST as postLabeler } from "@/app/api/labelers/route";
import { MemoryAnnotationStore } from "@/lib/store/memory";
import type { AnnotationStore } from "@/lib/store/types";
import { testSeed, tickingClock } from "@/lib/testing/local-api";

const stores = vi.hoisted(() => {
  const holder: { current: AnnotationStore | null } = { current: null };
  return holder;
});

vi.mock("@/lib/store", () => ({
  getStore: async () => {
    if (!stores.current) {
      throw new Error("Store unavailable");
    }
    return stores.current;
  },
}));

function jsonRequest(path: string, body: string) {
  return new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body,
  });
}

beforeEach(() => {
  stores.current = new MemoryAnnotationStore(testSeed, { now: tickingClock() });
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("POST /api/judgments", () => {
  it("records a verdict for a known labeler", async () => {
    await postLabeler(jsonRequest("/api/labelers", JSON.stringify({ name: "Ana", labeler_id: "lab-1" })));

    const response = await postJudgment(
      jsonRequest(
        "/api/judgments",
        JSON.stringify({ email_hash: "hash-1", labeler_id: "lab-1", pass_fail: false })
      )
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      email_hash: "hash-1",
      labeler_id: "lab-1",
      run_id: "run-a",
      pass_fail: false,
    });
  });

  it("answers malformed JSON with a 400", async () => {
    const response = await postJudgment(jsonRequest("/api/judgments", "{"));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Invalid JSON body." });
  });

  it("answers validation failures with a 400", async () => {
    const response = await postJudgment(
      jsonRequest(
        "/api/judgments",
        JSON.stringify({ email_hash: "hash-1", labeler_id: "lab-1", pass_fail: "yes" })
      )
    );

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "pass_fail must be a boolean" });
  });

  it("answers unknown labelers with a 404", async () => {
    const response = await postJudgment(
      jsonRequest(
        "/api/judgments",
        JSON.stringify({ email_hash: "hash-1", labeler_id: "ghost", pass_fail: true })
      )
    );

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: "Labeler not found" });
  });

  it("logs and answers a 500 when the store is unavailable", async () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);
    stores.current = null;

    const response = await postJudgment(
      jsonRequest(
        "/api/judgments",
        JSON.stringify({ email_hash: "hash-1", labeler_id: "lab-1", pass_fail: true })
      )
    );

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "Internal server error." });
    expect(log).toHaveBeenCalledWith(
      "Error in POST /api/judgments:",
      expect.objectContaining({ message: "Store unavailable" })
    );
  });
});

describe("DELETE handlers", () => {
  it("require their query parameters", async () => {
    const judgment = await deleteJudgment(
      new Request("http://localhost/api/judgments?email_hash=hash-1", { method: "DELETE" })
    );
    const link = await deleteAxialLink(
      new Request("http://localhost/api/axial-links?annotation_id=a1", { method: "DELETE" })
    );

    expect(judgment.status).toBe(400);
    expect(await judgment.json()).toEqual({ error: "email_hash and labeler_id required" });
    expect(link.status).toBe(400);
    expect(await link.json()).toEqual({ error: "annotation_id and failure_mode_id required" });
  });

  it("reports whether a judgment was removed", async () => {
    const response = await deleteJudgment(
      new Request("http://localhost/api/judgments?email_hash=hash-1&labeler_id=lab-1", {
        method: "DELETE",
      })
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ deleted: false });
  });
});

describe("POST /api/failure-modes", () => {
  it("derives the slug from the display name", async () => {
    const response = await createFailureMode(
      jsonRequest("/api/failure-modes", JSON.stringify({ display_name: "Wrong Owner or Date" }))
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      slug: "wrong-owner-or-date",
      display_name: "Wrong Owner or Date",
      definition: "",
    });
  });
});
