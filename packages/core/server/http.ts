import type { IncomingMessage, ServerResponse } from "node:http";
import { parseClipUpload } from "../models/schema";
import type { ClipStore } from "../store/store";
import { describeError } from "../errors";
import { createLogger, type Logger } from "../logger";

export const CLIP_PATH = "/clip";
export const LATEST_PATH = "/clip/latest";
export const DEFAULT_MAX_BODY_BYTES = 32 * 1024 * 1024;

export const CORS_HEADERS: Readonly<Record<string, string>> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET,POST,OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type",
  "Access-Control-Max-Age": "86400",
};

export type RequestHandlerOptions = {
  store: ClipStore;
  maxBodyBytes?: number;
  logger?: Logger;
};

type BodyResult = { ok: true; body: Buffer } | { ok: false; reason: "too-large" };

function sendJson(res: ServerResponse, status: number, body: unknown, extra: Record<string, string> = {}) {
  const payload = Buffer.from(JSON.stringify(body), "utf8");
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": String(payload.byteLength),
    "Access-Control-Allow-Origin": "*",
    ...extra,
  });
  res.end(payload);
}

function sendPreflight(res: ServerResponse) {
  res.writeHead(200, { ...CORS_HEADERS, "Content-Length": "0" });
  res.end();
}

/**
 * Read the request body up to `limit` bytes. Past the limit the rest is
 * drained and discarded so a response can still be written.
 */
function readBody(req: IncomingMessage, limit: number): Promise<BodyResult> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on("data", (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.byteLength;
      if (size > limit) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      resolve(tooLarge ? { ok: false, reason: "too-large" } : { ok: true, body: Buffer.concat(chunks) });
    });
    req.on("error", reject);
  });
}

function declaredLength(req: IncomingMessage): number | undefined {
  const header = req.headers["content-length"];
  if (!header) return undefined;
  const n = Number(header);
  return Number.isFinite(n) ? n : undefined;
}

/**
 * HTTP façade over a {@link ClipStore}: `GET /clip`, `GET /clip/latest`,
 * `POST /clip` and CORS preflight. Every path ends in a JSON response.
 */
export function createRequestHandler(options: RequestHandlerOptions) {
  const { store } = options;
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const log = options.logger ?? createLogger("server");

  function handleGet(res: ServerResponse) {
    const slot = store.current();
    if (!slot) {
      sendJson(res, 404, { error: "No clip available" });
      return;
    }
    sendJson(res, 200, slot);
  }

  async function handlePost(req: IncomingMessage, res: ServerResponse) {
    const declared = declaredLength(req);
    if (declared !== undefined && declared > maxBodyBytes) {
      req.resume();
      sendJson(res, 413, { error: "Body too large" });
      return;
    }
    const read = await readBody(req, maxBodyBytes);
    if (!read.ok) {
      sendJson(res, 413, { error: "Body too large" });
      return;
    }
    if (read.body.byteLength === 0) {
      sendJson(res, 400, { error: "Missing body" });
      return;
    }

    let incoming: unknown;
    try {
      incoming = JSON.parse(read.body.toString("utf8"));
    } catch {
      log.debug("Rejected clip upload: invalid JSON");
      sendJson(res, 400, { error: "Invalid JSON" });
      return;
    }

    const parsed = parseClipUpload(incoming);
    if (!parsed.ok) {
      log.debug("Rejected clip upload", { error: parsed.error });
      sendJson(res, 400, { error: parsed.error });
      return;
    }

    const saved = await store.save(parsed.value);
    if (!saved.ok) {
      sendJson(res, 500, { error: "Failed to persist clip" });
      return;
    }
    log.info("Stored clip", {
      type: saved.record.type,
      source: saved.record.source,
      revision: saved.record.revision,
      length: saved.record.data.length,
    });
    sendJson(res, 200, { status: "ok", revision: saved.record.revision });
  }

  async function route(req: IncomingMessage, res: ServerResponse) {
    const method = (req.method ?? "GET").toUpperCase();
    const pathname = (req.url ?? "/").split("?")[0];

    if (method === "OPTIONS") {
      req.resume();
      sendPreflight(res);
      return;
    }

    if (method === "POST" && pathname === CLIP_PATH) {
      await handlePost(req, res);
      return;
    }

    if ((pathname === CLIP_PATH || pathname === LATEST_PATH) && method !== "POST") {
      req.resume();
      if (method === "GET" || method === "HEAD") {
        handleGet(res);
        return;
      }
      const allow = pathname === CLIP_PATH ? "GET, HEAD, POST, OPTIONS" : "GET, HEAD, OPTIONS";
      sendJson(res, 405, { error: "Method not allowed" }, { Allow: allow });
      return;
    }

    req.resume();
    sendJson(res, 404, { error: "Not found" });
  }

  return (req: IncomingMessage, res: ServerResponse): void => {
    route(req, res).catch((err: unknown) => {
      log.error("Request handler failed", { error: describeError(err), url: req.url });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal server error" });
      } else {
        res.destroy();
      }
    });
  };
}
