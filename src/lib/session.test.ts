import { describe, expect, it } from "vitest";
import {
  canAdvance,
  canRetreat,
  currentEmailHash,
  formatPosition,
  initialSession,
  stepIndex,
  withContext,
  withIndex,
  withNewLabeler,
} from "@/lib/session";
import type { ContextResponse } from "@/lib/types";

const context: ContextResponse = {
  run_id: "run-a",
  email_hashes: ["h1", "h2", "h3"],
  labelers: [["lab-1", "Ana"]],
};

describe("session navigation", () => {
  it("shows 0 / 0 for an empty run and never moves", () => {
    const state = withContext(initialSession, { ...context, email_hashes: [] });

    expect(formatPosition(state)).toBe("0 / 0");
    expect(currentEmailHash(state)).toBeNull();
    expect(stepIndex(state, 1)).toBeNull();
    expect(stepIndex(state, -1)).toBeNull();
  });

  it("steps within bounds only", () => {
    const first = withContext(initialSession, context);
    expect(formatPosition(first)).toBe("1 / 3");
    expect(canRetreat(first)).toBe(false);
    expect(stepIndex(first, 1)).toBe(1);

    const last = withIndex(first, 2);
    expect(formatPosition(last)).toBe("3 / 3");
    expect(canAdvance(last)).toBe(false);
    expect(stepIndex(last, 1)).toBeNull();
    expect(stepIndex(last, -1)).toBe(1);
  });

  it("returns a new state on every transition", () => {
    const first = withContext(initialSession, context);
    const moved = withIndex(first, 1);

    expect(first.index).toBe(0);
    expect(moved.index).toBe(1);
    expect(currentEmailHash(moved)).toBe("h2");
  });
});

describe("withContext", () => {
  it("keeps the preferred labeler only while listed", () => {
    expect(withContext(initialSession, context, "lab-1").labelerId).toBe("lab-1");
    expect(withContext(initialSession, context, "gone").labelerId).toBeNull();
  });

  it("resets the index and view", () => {
    const moved = withIndex(withContext(initialSession, context), 2);
    const reloaded = withContext(moved, { ...context, run_id: "run-b" });

    expect(reloaded.index).toBe(0);
    expect(reloaded.runId).toBe("run-b");
    expect(reloaded.view).toBeNull();
  });
});

describe("withNewLabeler", () => {
  it("appends to the roster and selects the labeler", () => {
    const state = withNewLabeler(withContext(initialSession, context), {
      labeler_id: "lab-2",
      name: "Bo",
    });

    expect(state.labelers).toEqual([
      ["lab-1", "Ana"],
      ["lab-2", "Bo"],
    ]);
    expect(state.labelerId).toBe("lab-2");
  });
});
