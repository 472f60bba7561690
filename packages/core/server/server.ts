import http from "node:http";
import type { AddressInfo } from "node:net";
import { ClipStore } from "../store/store";
import { createSlotBackend } from "../store";
import type { ClipbridgeConfig } from "../config";
import { createLogger, type Logger } from "../logger";
import { createRequestHandler } from "./http";

export interface StoreServerOptions {
  store: ClipStore;
  host?: string;
  port?: number;
  maxBodyBytes?: number;
  logger?: Logger;
}

export interface StartedStoreServer {
  server: http.Server;
  store: ClipStore;
  /** Base URL clients on this machine can use. */
  url: string;
  port: number;
  stop: () => Promise<void>;
}

function formatUrl(address: AddressInfo): string {
  const wildcard = address.address === "0.0.0.0" || address.address === "::";
  const host = wildcard ? "127.0.0.1" : address.address;
  const shown = host.includes(":") ? `[${host}]` : host;
  return `http://${shown}:${address.port}`;
}

/**
 * Start the HTTP store server. The server owns `store`: `stop()` closes the
 * listener, drops idle keep-alive connections and then closes the store.
 */
export async function startStoreServer(options: StoreServerOptions): Promise<StartedStoreServer> {
  const log = options.logger ?? createLogger("server");
  const host = options.host ?? "0.0.0.0";
  const handler = createRequestHandler({
    store: options.store,
    maxBodyBytes: options.maxBodyBytes,
    logger: log,
  });
  const server = http.createServer(handler);

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once("error", onError);
    server.listen(options.port ?? 5000, host, () => {
      server.off("error", onError);
      resolve();
    });
  });

  server.on("clientError", (_err, socket) => {
    if (socket.writable) socket.end("HTTP/1.1 400 Bad Request\r\n\r\n");
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("store server is not listening on a TCP address");
  }
  const url = formatUrl(address);
  log.info("Serving clipboard", { host, port: address.port, url });

  let stopping: Promise<void> | null = null;
  const stop = () => {
    if (!stopping) {
      stopping = (async () => {
        await new Promise<void>((resolve, reject) => {
          server.close((err) => (err ? reject(err) : resolve()));
          server.closeIdleConnections();
        });
        await options.store.close();
        log.info("Store server stopped");
      })();
    }
    return stopping;
  };

  return { server, store: options.store, url, port: address.port, stop };
}

/**
 * Open the configured backend, load the persisted slot and start listening.
 */
export async function startStoreServerFromConfig(
  config: Pick<ClipbridgeConfig, "server">,
  logger?: Logger
): Promise<StartedStoreServer> {
  const log = logger ?? createLogger("server");
  const store = new ClipStore(createSlotBackend(config.server.storePath), { logger: log });
  const slot = await store.load();
  log.info("Store loaded", {
    location: config.server.storePath,
    revision: slot?.revision ?? 0,
  });
  return startStoreServer({
    store,
    host: config.server.host,
    port: config.server.port,
    maxBodyBytes: config.server.maxBodyBytes,
    logger: log,
  });
}
