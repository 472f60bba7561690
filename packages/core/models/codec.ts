/**
 * Conversion between wire records (string data) and decoded clips (bytes).
 */
import type { Clip, ClipRecord } from "./Clip";
import { ClipKind, ClipOrigin, DEFAULT_MIME } from "./enums";

// Helper: Remove data URI prefix from base64
function stripDataUriPrefix(data: string): string {
  const match = data.match(/^data:[^;,]+;base64,(.*)$/s);
  return match ? match[1] : data;
}

export function decodePayload(kind: ClipKind, data: string): Uint8Array {
  if (kind === ClipKind.Image) {
    return Buffer.from(stripDataUriPrefix(data), "base64");
  }
  return Buffer.from(data, "utf8");
}

export function encodePayload(kind: ClipKind, payload: Uint8Array): string {
  const buf = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
  if (kind === ClipKind.Image) {
    return buf.toString("base64");
  }
  return buf.toString("utf8");
}

export function decodeRecord(record: ClipRecord): Clip {
  return {
    id: record.id,
    kind: record.type,
    payload: decodePayload(record.type, record.data),
    mime: record.mime || DEFAULT_MIME[record.type],
    origin: record.source,
    createdAt: record.createdAt,
    revision: record.revision,
  };
}

/**
 * Body for `POST /clip` built from local clipboard content.
 */
export function toUploadBody(
  kind: ClipKind,
  payload: Uint8Array,
  origin: ClipOrigin,
  mime?: string
): { type: ClipKind; data: string; mime: string; source: ClipOrigin } {
  return {
    type: kind,
    data: encodePayload(kind, payload),
    mime: mime || DEFAULT_MIME[kind],
    source: origin,
  };
}
