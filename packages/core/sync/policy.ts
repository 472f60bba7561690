/**
 * Reconciliation rules shared by the continuous engine and the one-shot
 * commands. Everything here is pure: state in, decision or new state out.
 *
 * Echo suppression rests on the pending-pull fingerprint. It is set before
 * a clipboard write starts and stays set across ticks, even when the write
 * times out, until a local read shows that content (settled) or a newer
 * local copy or pull replaces it. While it is set, reads that still show the
 * pre-pull content are skipped instead of being pushed over the remote clip.
 */
import { ActionOrigin, ClipOrigin } from "../models/enums";

export interface EngineState {
  lastLocalFingerprint: string | null;
  lastRemoteFingerprint: string | null;
  lastActionOrigin: ActionOrigin;
  /** The last push failed and nothing has superseded it since. */
  pushPending: boolean;
  /** Highest store revision observed, from a push ack or a fetch. */
  lastSeenRevision: number | null;
  /** Content of a pull whose write has not been seen on the clipboard yet. */
  pendingPullFingerprint: string | null;
}

export function initialEngineState(): EngineState {
  return {
    lastLocalFingerprint: null,
    lastRemoteFingerprint: null,
    lastActionOrigin: ActionOrigin.None,
    pushPending: false,
    lastSeenRevision: null,
    pendingPullFingerprint: null,
  };
}

export type LocalDecision =
  | { action: "push"; retry: boolean }
  | { action: "suppress-echo" }
  | { action: "none"; settled: boolean };

export type RemoteDecision =
  | { action: "pull" }
  | { action: "none"; reason: "unchanged" | "own-origin" };

export function decideLocal(state: EngineState, fingerprint: string): LocalDecision {
  if (state.pendingPullFingerprint !== null) {
    if (fingerprint === state.pendingPullFingerprint) return { action: "none", settled: true };
    // still the pre-pull content
    if (fingerprint === state.lastLocalFingerprint) return { action: "suppress-echo" };
    return { action: "push", retry: false };
  }
  if (fingerprint !== state.lastLocalFingerprint) {
    return { action: "push", retry: false };
  }
  if (state.pushPending && fingerprint !== state.lastRemoteFingerprint) {
    return { action: "push", retry: true };
  }
  return { action: "none", settled: false };
}

export function afterPush(
  state: EngineState,
  fingerprint: string,
  result: { ok: true; revision: number | null } | { ok: false }
): EngineState {
  if (result.ok) {
    return {
      ...state,
      lastLocalFingerprint: fingerprint,
      lastRemoteFingerprint: fingerprint,
      lastActionOrigin: ActionOrigin.Local,
      pushPending: false,
      lastSeenRevision: result.revision ?? state.lastSeenRevision,
      pendingPullFingerprint: null,
    };
  }
  return {
    ...state,
    lastLocalFingerprint: fingerprint,
    lastActionOrigin: ActionOrigin.Local,
    pushPending: true,
    pendingPullFingerprint: null,
  };
}

/** The clipboard now shows the pulled content. */
export function afterLocalSettled(state: EngineState, fingerprint: string): EngineState {
  return {
    ...state,
    lastLocalFingerprint: fingerprint,
    lastRemoteFingerprint: fingerprint,
    lastActionOrigin: ActionOrigin.None,
    pushPending: false,
    pendingPullFingerprint: null,
  };
}

export function decideRemote(
  state: EngineState,
  fingerprint: string,
  origin: ClipOrigin,
  selfOrigin: ClipOrigin
): RemoteDecision {
  if (fingerprint === state.lastRemoteFingerprint) {
    return { action: "none", reason: "unchanged" };
  }
  if (origin === selfOrigin) {
    return { action: "none", reason: "own-origin" };
  }
  return { action: "pull" };
}

/** Called before the clipboard write starts, so a write that times out stays pending. */
export function beforePull(state: EngineState, fingerprint: string): EngineState {
  return { ...state, pendingPullFingerprint: fingerprint };
}

/**
 * The write resolved. `lastLocalFingerprint` keeps the pre-pull content until
 * a local read settles the pull.
 */
export function afterPull(state: EngineState, fingerprint: string): EngineState {
  return {
    ...state,
    lastRemoteFingerprint: fingerprint,
    lastActionOrigin: ActionOrigin.Remote,
    pushPending: false,
    pendingPullFingerprint: fingerprint,
  };
}

/**
 * Record a store revision. `missed` counts writes that were replaced before
 * this endpoint saw them; a lower revision means the store was reset and is
 * recorded without counting.
 */
export function observeRevision(state: EngineState, revision: number): { state: EngineState; missed: number } {
  const last = state.lastSeenRevision;
  if (last === null || revision <= last) {
    return { state: revision === last ? state : { ...state, lastSeenRevision: revision }, missed: 0 };
  }
  return {
    state: { ...state, lastSeenRevision: revision },
    missed: Math.max(0, revision - last - 1),
  };
}
