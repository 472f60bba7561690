import type { ClipboardCapability, LocalClip } from "../clipboard/types";
import { isEmptyClip } from "../clipboard/types";
import type { StoreClient } from "../client/storeClient";
import type { Clip } from "../models/Clip";
import type { ClipKind, ClipOrigin } from "../models/enums";
import { describeError } from "../errors";

export type OneShotFailure = {
  ok: false;
  reason: "empty" | "clipboard" | "network";
  error: string;
};

export type PushOnceResult = { ok: true; kind: ClipKind; bytes: number; revision: number | null } | OneShotFailure;

export type PullOnceResult = { ok: true; clip: Clip } | OneShotFailure;

/**
 * Push whatever is on the clipboard right now, once.
 */
export async function pushOnce(options: {
  clipboard: ClipboardCapability;
  client: StoreClient;
  origin: ClipOrigin;
}): Promise<PushOnceResult> {
  let local: LocalClip | null;
  try {
    local = await options.clipboard.read();
  } catch (err) {
    return { ok: false, reason: "clipboard", error: `Failed to read clipboard: ${describeError(err)}` };
  }
  if (isEmptyClip(local)) {
    return { ok: false, reason: "empty", error: "Clipboard is empty or unsupported." };
  }
  const result = await options.client.push(local, options.origin);
  if (!result.ok) {
    return { ok: false, reason: "network", error: `Failed to push clipboard: ${result.error}` };
  }
  return { ok: true, kind: local.kind, bytes: local.payload.byteLength, revision: result.revision };
}

/**
 * Copy the store's latest clip onto the local clipboard, once. Origin is not
 * checked: an explicit pull always applies.
 */
export async function pullOnce(options: {
  clipboard: ClipboardCapability;
  client: StoreClient;
}): Promise<PullOnceResult> {
  const fetched = await options.client.fetchLatest();
  if (!fetched.ok) {
    return { ok: false, reason: "network", error: `Failed to fetch clip: ${fetched.error}` };
  }
  if (!fetched.clip) {
    return { ok: false, reason: "empty", error: "Server returned no clip." };
  }
  const clip = fetched.clip;
  try {
    await options.clipboard.write(clip.kind, clip.payload);
  } catch (err) {
    return { ok: false, reason: "clipboard", error: `Failed to set ${clip.kind} clipboard: ${describeError(err)}` };
  }
  return { ok: true, clip };
}
