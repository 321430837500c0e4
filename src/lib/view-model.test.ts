import { describe, expect, it } from "vitest";
import type { Annotation, EmailPayload } from "@/lib/types";
import {
  firstPresent,
  formatBody,
  metadataText,
  project,
  resolveMetadataChips,
} from "@/lib/view-model";

function annotation(overrides: Partial<Annotation>): Annotation {
  return {
    annotation_id: "ann-1",
    email_hash: "hash-1",
    labeler_id: "lab-1",
    open_code: "note",
    pass_fail: null,
    run_id: "run-a",
    created_at: "2026-01-01T00:00:00.000Z",
    updated_at: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function payload(overrides: Partial<EmailPayload> = {}): EmailPayload {
  return {
    email: {
      email_hash: "hash-1",
      subject: "Budget sync",
      body: "Hello\n> quoted",
      metadata: {},
      run_id: "run-a",
      ingested_at: "2026-01-01T00:00:00.000Z",
    },
    judgment: null,
    annotations: [],
    available_failure_modes: [],
    failure_modes: [],
    ...overrides,
  };
}

describe("firstPresent", () => {
  it("returns the first non-null candidate", () => {
    expect(firstPresent([null, undefined, "b", "c"])).toBe("b");
  });

  it("returns null when nothing is present", () => {
    expect(firstPresent<string>([null, undefined])).toBeNull();
  });
});

describe("metadataText", () => {
  it("treats blank strings as absent", () => {
    expect(metadataText("   ")).toBeNull();
  });

  it("joins recipient lists", () => {
    expect(metadataText(["a@example.com", " ", "b@example.com"])).toBe(
      "a@example.com, b@example.com"
    );
  });

  it("ignores non-text values", () => {
    expect(metadataText(42)).toBeNull();
    expect(metadataText(undefined)).toBeNull();
  });
});

describe("resolveMetadataChips", () => {
  it("prefers structured fields over raw headers", () => {
    const chips = resolveMetadataChips({
      from_email: "sam@example.com",
      from_raw: "Sam <sam@example.com>",
      to_emails: [],
      to_raw: "team@example.com",
      date_raw: "Mon, 5 Jan 2026",
    });

    expect(chips).toEqual([
      { label: "From", value: "sam@example.com" },
      { label: "To", value: "team@example.com" },
      { label: "Date", value: "Mon, 5 Jan 2026" },
    ]);
  });

  it("falls back to the raw header when the structured field is blank", () => {
    expect(resolveMetadataChips({ from_email: " ", from_raw: "Sam <sam@example.com>" })).toEqual([
      { label: "From", value: "Sam <sam@example.com>" },
    ]);
  });

  it("omits chips with no value", () => {
    expect(resolveMetadataChips({})).toEqual([]);
  });
});

describe("formatBody", () => {
  it("marks lines starting with > as quotes", () => {
    expect(formatBody("Hi\r\n> earlier\n  > indented")).toEqual([
      { kind: "text", text: "Hi" },
      { kind: "quote", text: "> earlier" },
      { kind: "text", text: "  > indented" },
    ]);
  });

  it("keeps markup as plain text", () => {
    expect(formatBody("<b>bold</b>")).toEqual([{ kind: "text", text: "<b>bold</b>" }]);
  });
});

describe("project", () => {
  it("renders empty states when nothing is recorded", () => {
    const view = project(payload({ email: { ...payload().email, subject: "  " } }), null);

    expect(view.subject).toBe("(no subject)");
    expect(view.summary).toBeNull();
    expect(view.commitments).toEqual([]);
    expect(view.judgment).toEqual({ kind: "none" });
    expect(view.tint).toBe("none");
    expect(view.ownAnnotation).toBeNull();
  });

  it("derives the verdict and tint from the judgment", () => {
    const view = project(
      payload({
        judgment: {
          email_hash: "hash-1",
          labeler_id: "lab-1",
          pass_fail: false,
          run_id: "run-a",
          judged_at: "2026-01-02T00:00:00.000Z",
          updated_at: "2026-01-03T00:00:00.000Z",
        },
      }),
      "lab-1"
    );

    expect(view.judgment).toEqual({ kind: "fail", at: "2026-01-03T00:00:00.000Z" });
    expect(view.tint).toBe("fail");
  });

  it("picks the active labeler's annotation as its own", () => {
    const mine = annotation({ annotation_id: "mine", labeler_id: "lab-2" });
    const view = project(
      payload({ annotations: [annotation({ annotation_id: "other" }), mine] }),
      "lab-2"
    );

    expect(view.ownAnnotation?.annotation_id).toBe("mine");
    expect(view.annotations).toHaveLength(2);
  });

  it("reads summary and commitments from metadata", () => {
    const base = payload();
    const view = project(
      payload({
        email: {
          ...base.email,
          metadata: { summary: " Sends numbers. ", commitments: ["Send numbers", " "] },
        },
      }),
      null
    );

    expect(view.summary).toBe("Sends numbers.");
    expect(view.commitments).toEqual(["Send numbers"]);
  });
});
