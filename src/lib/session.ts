import type { ContextResponse, LabelerPair } from "@/lib/types";
import type { EmailViewModel } from "@/lib/view-model";

export type SessionState = {
  runId: string | null;
  emailHashes: string[];
  index: number;
  labelers: LabelerPair[];
  labelerId: string | null;
  view: EmailViewModel | null;
};

export const initialSession: SessionState = {
  runId: null,
  emailHashes: [],
  index: 0,
  labelers: [],
  labelerId: null,
  view: null,
};

export function currentEmailHash(state: SessionState): string | null {
  return state.emailHashes[state.index] ?? null;
}

export function formatPosition(state: SessionState) {
  const total = state.emailHashes.length;
  return total === 0 ? "0 / 0" : `${state.index + 1} / ${total}`;
}

export function canRetreat(state: SessionState) {
  return state.emailHashes.length > 0 && state.index > 0;
}

export function canAdvance(state: SessionState) {
  return state.index < state.emailHashes.length - 1;
}

/** Target index for a ±1 move, or null when the move would leave the list. */
export function stepIndex(state: SessionState, delta: 1 | -1): number | null {
  if (delta === 1 ? !canAdvance(state) : !canRetreat(state)) {
    return null;
  }
  return state.index + delta;
}

/**
 * Starts a fresh session for a loaded run. The previously active labeler
 * carries over only while they are still on the roster.
 */
export function withContext(
  state: SessionState,
  context: ContextResponse,
  preferredLabelerId: string | null = state.labelerId
): SessionState {
  const stillListed = context.labelers.some(([id]) => id === preferredLabelerId);
  return {
    runId: context.run_id,
    emailHashes: context.email_hashes,
    index: 0,
    labelers: context.labelers,
    labelerId: stillListed ? preferredLabelerId : null,
    view: null,
  };
}

export function withIndex(state: SessionState, index: number): SessionState {
  return { ...state, index, view: null };
}

export function withView(state: SessionState, view: EmailViewModel | null): SessionState {
  return { ...state, view };
}

export function withLabeler(state: SessionState, labelerId: string | null): SessionState {
  return { ...state, labelerId };
}

export function withNewLabeler(
  state: SessionState,
  labeler: { labeler_id: string; name: string }
): SessionState {
  return {
    ...state,
    labelers: [...state.labelers, [labeler.labeler_id, labeler.name]],
    labelerId: labeler.labeler_id,
  };
}
