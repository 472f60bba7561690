import type { ClipboardCapability, LocalClip } from "../clipboard/types";
import { isEmptyClip } from "../clipboard/types";
import { fingerprint } from "../clipboard/fingerprint";
import type { StoreClient } from "../client/storeClient";
import type { ClipKind, ClipOrigin } from "../models/enums";
import { describeError, withTimeout } from "../errors";
import { createLogger, type Logger } from "../logger";
import {
  afterLocalSettled,
  afterPull,
  afterPush,
  beforePull,
  decideLocal,
  decideRemote,
  initialEngineState,
  observeRevision,
  type EngineState,
} from "./policy";

export type FailureStage = "clipboard-read" | "push" | "fetch" | "clipboard-write";

export type StepFailure = { kind: "failed"; stage: FailureStage; error: string };

export type LocalOutcome =
  | { kind: "none"; reason: "empty" | "unchanged" }
  | { kind: "pushed"; clipKind: ClipKind; fingerprint: string; revision: number | null; retry: boolean }
  | { kind: "echo-suppressed"; fingerprint: string }
  | StepFailure;

export type RemoteOutcome =
  | { kind: "none"; reason: "no-clip" | "unchanged" | "own-origin" }
  | { kind: "pulled"; clipKind: ClipKind; fingerprint: string; origin: ClipOrigin; revision: number }
  | StepFailure;

export interface TickReport {
  local: LocalOutcome;
  remote: RemoteOutcome;
}

export interface EngineStats {
  ticks: number;
  pushes: number;
  pulls: number;
  echoSuppressed: number;
  failures: Record<FailureStage, number>;
  loopErrors: number;
  missedRevisions: number;
}

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export type SyncEngineOptions = {
  clipboard: ClipboardCapability;
  client: StoreClient;
  origin: ClipOrigin;
  pollIntervalMs?: number;
  errorBackoffMs?: number;
  clipboardTimeoutMs?: number;
  sleep?: SleepFn;
  logger?: Logger;
};

export interface SyncEngine {
  /** One reconciliation pass. Step failures are reported, not thrown. */
  tick(): Promise<TickReport>;
  /** Run ticks until `stop()`; resolves once the loop has exited. */
  run(): Promise<void>;
  start(): void;
  /** Ends the loop between ticks. An in-flight tick completes first. */
  stop(): Promise<void>;
  pause(): void;
  resume(): void;
  isRunning(): boolean;
  isPaused(): boolean;
  getStatus(): string;
  getStats(): EngineStats;
  getState(): EngineState;
  onTick(cb: (report: TickReport) => void): void;
}

/**
 * Sleep that resolves early when `signal` aborts.
 */
export function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

function emptyStats(): EngineStats {
  return {
    ticks: 0,
    pushes: 0,
    pulls: 0,
    echoSuppressed: 0,
    failures: { "clipboard-read": 0, push: 0, fetch: 0, "clipboard-write": 0 },
    loopErrors: 0,
    missedRevisions: 0,
  };
}

export function createSyncEngine(options: SyncEngineOptions): SyncEngine {
  const { clipboard, client, origin } = options;
  const pollIntervalMs = options.pollIntervalMs ?? 500;
  const errorBackoffMs = options.errorBackoffMs ?? 1000;
  const clipboardTimeoutMs = options.clipboardTimeoutMs ?? 5000;
  const sleep = options.sleep ?? abortableSleep;
  const log = options.logger ?? createLogger("sync");

  let state = initialEngineState();
  const stats = emptyStats();
  let status = "Starting...";
  let running = false;
  let paused = false;
  let loop: Promise<void> | null = null;
  let controller = new AbortController();
  const tickHandlers: Array<(report: TickReport) => void> = [];
  // stages currently failing, so a persistent outage logs once
  const failing = new Set<FailureStage>();

  function fail(stage: FailureStage, err: unknown): StepFailure {
    const error = describeError(err);
    stats.failures[stage]++;
    if (!failing.has(stage)) {
      failing.add(stage);
      log.warn(`${stage} failed`, { error });
    } else {
      log.debug(`${stage} still failing`, { error });
    }
    return { kind: "failed", stage, error };
  }

  function recovered(stage: FailureStage) {
    if (failing.delete(stage)) {
      log.info(`${stage} recovered`);
    }
  }

  async function localStep(): Promise<LocalOutcome> {
    let local: LocalClip | null;
    try {
      local = await withTimeout(clipboard.read(), clipboardTimeoutMs, "clipboard read");
    } catch (err) {
      return fail("clipboard-read", err);
    }
    recovered("clipboard-read");
    if (isEmptyClip(local)) return { kind: "none", reason: "empty" };

    const fp = fingerprint(local.payload);
    const decision = decideLocal(state, fp);
    if (decision.action === "none") {
      if (decision.settled) state = afterLocalSettled(state, fp);
      return { kind: "none", reason: "unchanged" };
    }
    if (decision.action === "suppress-echo") {
      stats.echoSuppressed++;
      log.debug("Skipped stale local content while a pull is landing", { fingerprint: fp });
      return { kind: "echo-suppressed", fingerprint: fp };
    }

    status = `Pushing ${local.kind}...`;
    log.info(`Pushing ${local.kind} to server`, { retry: decision.retry, bytes: local.payload.byteLength });
    const result = await client.push(local, origin);
    state = afterPush(state, fp, result);
    if (!result.ok) {
      status = `Push failed: ${result.error}`;
      return fail("push", result.error);
    }
    recovered("push");
    stats.pushes++;
    status = `Sent ${local.kind}`;
    return {
      kind: "pushed",
      clipKind: local.kind,
      fingerprint: fp,
      revision: result.revision,
      retry: decision.retry,
    };
  }

  async function remoteStep(): Promise<RemoteOutcome> {
    const fetched = await client.fetchLatest();
    if (!fetched.ok) return fail("fetch", fetched.error);
    recovered("fetch");
    const clip = fetched.clip;
    if (!clip) return { kind: "none", reason: "no-clip" };

    const observed = observeRevision(state, clip.revision);
    state = observed.state;
    if (observed.missed > 0) {
      stats.missedRevisions += observed.missed;
      log.warn("Store was overwritten before this endpoint saw some writes", {
        missed: observed.missed,
        revision: clip.revision,
      });
    }

    const fp = fingerprint(clip.payload);
    const decision = decideRemote(state, fp, clip.origin, origin);
    if (decision.action === "none") return { kind: "none", reason: decision.reason };

    status = `Pulling ${clip.kind}...`;
    log.info(`Pulling ${clip.kind} from server`, { origin: clip.origin, revision: clip.revision });
    state = beforePull(state, fp);
    try {
      await withTimeout(clipboard.write(clip.kind, clip.payload), clipboardTimeoutMs, "clipboard write");
    } catch (err) {
      status = `Clipboard write failed: ${describeError(err)}`;
      return fail("clipboard-write", err);
    }
    recovered("clipboard-write");
    state = afterPull(state, fp);
    stats.pulls++;
    status = `Received ${clip.kind}`;
    return { kind: "pulled", clipKind: clip.kind, fingerprint: fp, origin: clip.origin, revision: clip.revision };
  }

  async function tick(): Promise<TickReport> {
    const local = await localStep();
    const remote = await remoteStep();
    stats.ticks++;
    const report: TickReport = { local, remote };
    tickHandlers.forEach((h) => h(report));
    return report;
  }

  async function loopBody(): Promise<void> {
    log.info("Clipboard sync started", { origin, pollIntervalMs });
    status = paused ? "Paused" : "Watching clipboard...";
    while (running) {
      if (paused) {
        await sleep(pollIntervalMs, controller.signal);
        continue;
      }
      try {
        const report = await tick();
        if (report.local.kind === "none" && report.remote.kind === "none") {
          status = "Watching clipboard...";
        }
      } catch (err) {
        stats.loopErrors++;
        status = `Error: ${describeError(err).slice(0, 60)}`;
        log.error("Sync tick failed", { error: describeError(err) });
        if (!running) break;
        await sleep(errorBackoffMs, controller.signal);
        continue;
      }
      if (!running) break;
      await sleep(pollIntervalMs, controller.signal);
    }
    status = "Stopped";
    log.info("Clipboard sync stopped");
  }

  function run(): Promise<void> {
    if (loop) return loop;
    running = true;
    controller = new AbortController();
    loop = loopBody().finally(() => {
      running = false;
      loop = null;
    });
    return loop;
  }

  return {
    tick,
    run,
    start() {
      run().catch((err: unknown) => {
        log.error("Clipboard sync loop crashed", { error: describeError(err) });
      });
    },
    async stop() {
      running = false;
      controller.abort();
      if (loop) await loop;
    },
    pause() {
      paused = true;
      status = "Paused";
      log.info("Clipboard sync paused");
    },
    resume() {
      paused = false;
      status = "Watching clipboard...";
      log.info("Clipboard sync resumed");
    },
    isRunning: () => running,
    isPaused: () => paused,
    getStatus: () => status,
    getStats: () => ({ ...stats, failures: { ...stats.failures } }),
    getState: () => ({ ...state }),
    onTick: (cb) => tickHandlers.push(cb),
  };
}
