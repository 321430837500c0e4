import { describe, expect, it, vi } from "vitest";
import { ApiError, createApiClient, errorMessage } from "@/lib/api";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("errorMessage", () => {
  it("prefers the JSON error field", () => {
    expect(errorMessage(404, '{"error":"Email not found"}')).toBe("Email not found");
  });

  it("falls back to the raw body and then the status", () => {
    expect(errorMessage(502, " Bad gateway ")).toBe("Bad gateway");
    expect(errorMessage(500, '{"detail":"x"}')).toBe('{"detail":"x"}');
    expect(errorMessage(503, "")).toBe("HTTP 503");
  });
});

describe("createApiClient", () => {
  it("builds query strings and skips empty values", async () => {
    const fetcher = vi.fn(async (_input: string, _init?: RequestInit) =>
      jsonResponse({ run_id: "run-a", email_hashes: [], labelers: [] })
    );
    const api = createApiClient(fetcher, "http://test.local");

    await api.getContext("run a");
    await api.getContext(null);

    expect(fetcher.mock.calls[0][0]).toBe("http://test.local/api/context?run_id=run+a");
    expect(fetcher.mock.calls[1][0]).toBe("http://test.local/api/context");
  });

  it("sends JSON bodies with the right method", async () => {
    const fetcher = vi.fn(async (_input: string, _init?: RequestInit) =>
      jsonResponse({ annotation_id: "a/1" })
    );
    const api = createApiClient(fetcher);

    await api.updateAnnotation("a/1", "revised");

    const [url, init] = fetcher.mock.calls[0];
    expect(url).toBe("/api/annotations/a%2F1");
    expect(init?.method).toBe("PUT");
    expect(init?.body).toBe('{"open_code":"revised"}');
  });

  it("unwraps the suggestion list", async () => {
    const suggestion = { display_name: "Deadline", slug: "deadline", definition: "d" };
    const api = createApiClient(async () => jsonResponse({ suggestions: [suggestion] }));

    await expect(api.suggestFailureModes("hash-1")).resolves.toEqual([suggestion]);
  });

  it("throws ApiError with the server message", async () => {
    const api = createApiClient(async () => jsonResponse({ error: "Labeler not found" }, 404));

    const failure = api.setJudgment({ email_hash: "h", labeler_id: "l", pass_fail: true });
    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({ status: 404, message: "Labeler not found" });
  });
});
