import type { ClipboardCapability } from "../clipboard/types";
import { createSystemClipboard } from "../clipboard/platform/system";
import { createHttpStoreClient, type StoreClient } from "../client/storeClient";
import type { ClipbridgeConfig } from "../config";
import { createLogger, type Logger } from "../logger";
import { startStoreServerFromConfig, type StartedStoreServer } from "../server/server";
import { createSyncEngine, type SyncEngine, type TickReport } from "../sync/engine";
import { pullOnce, pushOnce } from "../sync/oneshot";

export type CommandDeps = {
  clipboard?: ClipboardCapability;
  client?: StoreClient;
  logger?: Logger;
};

export interface RunningService {
  stop(): Promise<void>;
}

function describeTick(report: TickReport): string | null {
  const parts: string[] = [];
  if (report.local.kind === "pushed") parts.push(`sent ${report.local.clipKind}`);
  if (report.remote.kind === "pulled") {
    parts.push(`received ${report.remote.clipKind} from ${report.remote.origin}`);
  }
  return parts.length ? parts.join(", ") : null;
}

export async function runServe(config: ClipbridgeConfig, deps: CommandDeps = {}): Promise<RunningService> {
  const server = await startStoreServerFromConfig(config, deps.logger ?? createLogger("server"));
  return { stop: server.stop };
}

export type RunningSync = RunningService & {
  engine: SyncEngine;
  server: StartedStoreServer | null;
};

/**
 * Start the sync loop; with `embeddedServer` the store server runs in the
 * same process and the engine talks to it directly.
 */
export async function runSync(
  config: ClipbridgeConfig,
  options: { embeddedServer?: boolean } & CommandDeps = {}
): Promise<RunningSync> {
  const log = options.logger ?? createLogger("sync");
  const server = options.embeddedServer
    ? await startStoreServerFromConfig(config, options.logger ?? createLogger("server"))
    : null;
  const client =
    options.client ??
    createHttpStoreClient({
      baseUrl: server ? server.url : config.client.serverUrl,
      timeoutMs: config.client.timeoutMs,
    });
  const engine = createSyncEngine({
    clipboard: options.clipboard ?? createSystemClipboard(),
    client,
    origin: config.sync.origin,
    pollIntervalMs: config.sync.pollIntervalMs,
    errorBackoffMs: config.sync.errorBackoffMs,
    clipboardTimeoutMs: config.sync.clipboardTimeoutMs,
    logger: log,
  });
  engine.onTick((report) => {
    const line = describeTick(report);
    if (line) log.debug(line, { status: engine.getStatus() });
  });
  log.info("Syncing clipboard", {
    server: server ? server.url : config.client.serverUrl,
    origin: config.sync.origin,
  });
  engine.start();
  return {
    engine,
    server,
    stop: async () => {
      await engine.stop();
      if (server) await server.stop();
    },
  };
}

function clientFor(config: ClipbridgeConfig, deps: CommandDeps): StoreClient {
  return deps.client ?? createHttpStoreClient({ baseUrl: config.client.serverUrl, timeoutMs: config.client.timeoutMs });
}

/** Returns the process exit code. */
export async function runPush(config: ClipbridgeConfig, deps: CommandDeps = {}): Promise<number> {
  const log = deps.logger ?? createLogger("push");
  const result = await pushOnce({
    clipboard: deps.clipboard ?? createSystemClipboard(),
    client: clientFor(config, deps),
    origin: config.sync.origin,
  });
  if (!result.ok) {
    log.error(result.error);
    return 1;
  }
  log.info(`Sent ${result.kind} to server at ${config.client.serverUrl}`, {
    bytes: result.bytes,
    revision: result.revision,
  });
  return 0;
}

/** Returns the process exit code. */
export async function runPull(config: ClipbridgeConfig, deps: CommandDeps = {}): Promise<number> {
  const log = deps.logger ?? createLogger("pull");
  const result = await pullOnce({
    clipboard: deps.clipboard ?? createSystemClipboard(),
    client: clientFor(config, deps),
  });
  if (!result.ok) {
    log.error(result.error);
    return 1;
  }
  log.info(`Copied latest ${result.clip.kind} from server to clipboard.`, {
    origin: result.clip.origin,
    revision: result.clip.revision,
  });
  return 0;
}
