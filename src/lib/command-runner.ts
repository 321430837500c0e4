import type { AnnotationApi } from "@/lib/api";
import { planIntent, type Dialog, type Effect, type Intent } from "@/lib/commands";
import { loadContext, provisionLabeler } from "@/lib/context-loader";
import { reloadEmail, requestSuggestion, runMutation } from "@/lib/mutations";
import {
  currentEmailHash,
  initialSession,
  withContext,
  withIndex,
  withLabeler,
  withNewLabeler,
  withView,
  type SessionState,
} from "@/lib/session";

/** Everything the runner needs from its host: dialogs, storage and render hooks. */
export type ShellPorts = {
  alert: (message: string) => void;
  confirm: (message: string) => boolean;
  prompt: (message: string) => string | null;
  loadLabelerPreference: () => string | null;
  saveLabelerPreference: (labelerId: string | null) => void;
  onSession: (state: SessionState) => void;
  onDialog: (dialog: Dialog | null) => void;
  onBusy: (busy: boolean) => void;
  onError: (message: string | null) => void;
};

export type CommandRunner = {
  getState: () => SessionState;
  isBusy: () => boolean;
  start: (runId: string | null) => Promise<void>;
  dispatch: (intent: Intent) => Promise<void>;
  addLabeler: () => Promise<void>;
};

export const messages = {
  labelerRequired: "Add a labeler before annotating.",
  noSuggestions: "No suggestions for this email yet.",
  newLabelerPrompt: "No labelers yet. Enter your name to start annotating:",
  labelerPrompt: "Labeler name:",
} as const;

function describeError(error: unknown) {
  return error instanceof Error && error.message ? error.message : "Request failed.";
}

/**
 * Executes planned effects one at a time. While an effect and its reload are
 * in flight, further commands are dropped.
 */
export function createCommandRunner(api: AnnotationApi, ports: ShellPorts): CommandRunner {
  let state: SessionState = initialSession;
  let busy = false;

  function commit(next: SessionState) {
    state = next;
    ports.onSession(next);
  }

  async function refresh(next: SessionState) {
    const emailHash = currentEmailHash(next);
    if (!emailHash) {
      commit(withView(next, null));
      return;
    }
    commit(next);
    try {
      commit(withView(next, await reloadEmail(api, emailHash, next.labelerId)));
    } catch (error) {
      commit(withView(next, null));
      throw error;
    }
  }

  async function exclusive(task: () => Promise<void>) {
    if (busy) {
      return;
    }
    busy = true;
    ports.onBusy(true);
    ports.onError(null);
    try {
      await task();
    } catch (error) {
      console.error(error);
      ports.onError(describeError(error));
    } finally {
      busy = false;
      ports.onBusy(false);
    }
  }

  async function loadRun(runId: string | null) {
    const result = await loadContext(api, runId);
    let next = withContext(
      state,
      result.context,
      ports.loadLabelerPreference() ?? state.labelerId
    );
    if (result.status === "needs-labeler") {
      const outcome = await provisionLabeler(api, ports.prompt(messages.newLabelerPrompt));
      if (outcome.status === "created") {
        next = withNewLabeler(next, outcome.labeler);
        ports.saveLabelerPreference(outcome.labeler.labeler_id);
      } else {
        ports.alert(messages.labelerRequired);
      }
    }
    await refresh(next);
  }

  async function applyMutation(effect: Extract<Effect, { kind: "mutate" }>) {
    try {
      await runMutation(api, effect.mutation);
    } catch (error) {
      // Earlier steps may have landed; show what the server holds now.
      await refresh(state);
      throw error;
    }
    if (effect.closeDialog) {
      ports.onDialog(null);
    }
    await refresh(state);
  }

  async function suggest(emailHash: string) {
    const outcome = await requestSuggestion(api, emailHash, ports.confirm);
    if (outcome.status === "empty") {
      ports.alert(messages.noSuggestions);
      return;
    }
    if (outcome.status === "declined") {
      return;
    }
    // Accepted suggestions still pass through the attach guards.
    const attach = planIntent(state, {
      kind: "attachFailureMode",
      selection: outcome.selection,
    });
    if (attach.kind === "alert") {
      ports.alert(attach.message);
    } else if (attach.kind === "mutate") {
      await applyMutation(attach);
    }
  }

  async function execute(effect: Effect) {
    switch (effect.kind) {
      case "none":
        return;
      case "alert":
        ports.alert(effect.message);
        return;
      case "openDialog":
        ports.onDialog(effect.dialog);
        return;
      case "loadContext":
        await loadRun(effect.runId);
        return;
      case "moveTo":
        ports.onDialog(null);
        await refresh(withIndex(state, effect.index));
        return;
      case "selectLabeler":
        ports.saveLabelerPreference(effect.labelerId);
        await refresh(withLabeler(state, effect.labelerId));
        return;
      case "mutate":
        await applyMutation(effect);
        return;
      case "suggest":
        await suggest(effect.emailHash);
        return;
    }
  }

  return {
    getState: () => state,
    isBusy: () => busy,
    start: (runId) => exclusive(() => loadRun(runId)),
    dispatch: async (intent) => {
      if (busy) {
        return;
      }
      const effect = planIntent(state, intent);
      if (effect.kind === "none" || effect.kind === "alert" || effect.kind === "openDialog") {
        await execute(effect);
        return;
      }
      await exclusive(() => execute(effect));
    },
    addLabeler: () =>
      exclusive(async () => {
        const outcome = await provisionLabeler(api, ports.prompt(messages.labelerPrompt));
        if (outcome.status === "declined") {
          return;
        }
        ports.saveLabelerPreference(outcome.labeler.labeler_id);
        await refresh(withNewLabeler(state, outcome.labeler));
      }),
  };
}
