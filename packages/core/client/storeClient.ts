import type { Clip } from "../models/Clip";
import type { ClipKind, ClipOrigin } from "../models/enums";
import { decodeRecord, toUploadBody } from "../models/codec";
import { parseClipRecord } from "../models/schema";
import { describeError } from "../errors";
import { stripTrailingSlash } from "../config";

export type FetchLatestResult =
  | { ok: true; clip: Clip | null }
  | { ok: false; error: string; status?: number };

export type PushResult =
  | { ok: true; revision: number | null }
  | { ok: false; error: string; status?: number };

export type OutgoingClip = {
  kind: ClipKind;
  payload: Uint8Array;
  mime?: string;
};

/**
 * Client side of the store server. Never throws: every failure comes back as
 * `{ ok: false }`.
 */
export interface StoreClient {
  fetchLatest(): Promise<FetchLatestResult>;
  push(clip: OutgoingClip, origin: ClipOrigin): Promise<PushResult>;
}

export type FetchFn = typeof fetch;

export type HttpStoreClientOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchFn;
};

async function readError(res: Response): Promise<string> {
  try {
    const body: unknown = await res.json();
    if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
      return body.error;
    }
  } catch {
    // body was not JSON; fall back to the status line
  }
  return `Server responded with ${res.status}`;
}

function readRevision(body: unknown): number | null {
  if (typeof body === "object" && body !== null && "revision" in body && typeof body.revision === "number") {
    return body.revision;
  }
  return null;
}

export function createHttpStoreClient(options: HttpStoreClientOptions): StoreClient {
  const baseUrl = stripTrailingSlash(options.baseUrl);
  const timeoutMs = options.timeoutMs ?? 2000;
  const doFetch: FetchFn = options.fetch ?? fetch;

  return {
    async fetchLatest() {
      let res: Response;
      try {
        res = await doFetch(`${baseUrl}/clip/latest`, {
          method: "GET",
          headers: { Accept: "application/json" },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        return { ok: false, error: describeError(err) };
      }
      if (res.status === 404) {
        // drain the "No clip available" body so the connection can be reused
        await readError(res);
        return { ok: true, clip: null };
      }
      if (res.status !== 200) {
        return { ok: false, error: await readError(res), status: res.status };
      }
      let body: unknown;
      try {
        body = await res.json();
      } catch (err) {
        return { ok: false, error: `Invalid response body: ${describeError(err)}`, status: res.status };
      }
      const parsed = parseClipRecord(body);
      if (!parsed.ok) {
        return { ok: false, error: `Invalid clip from server: ${parsed.error}`, status: res.status };
      }
      return { ok: true, clip: decodeRecord(parsed.value) };
    },

    async push(clip, origin) {
      const payload = toUploadBody(clip.kind, clip.payload, origin, clip.mime);
      let res: Response;
      try {
        res = await doFetch(`${baseUrl}/clip`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (err) {
        return { ok: false, error: describeError(err) };
      }
      if (res.status !== 200) {
        return { ok: false, error: await readError(res), status: res.status };
      }
      let body: unknown = null;
      try {
        body = await res.json();
      } catch {
        // acknowledgement without a JSON body still counts as stored
      }
      return { ok: true, revision: readRevision(body) };
    },
  };
}
