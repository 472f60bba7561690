/**
 * Clipboard content as it travels over HTTP and sits in the store.
 */
import { ClipKind, ClipOrigin } from "./enums";

export interface ClipRecord {
  /** Server-assigned identifier (UUID); empty for documents written before ids existed */
  id: string;
  /** Kind of clipboard item */
  type: ClipKind;
  /** Raw text, or base64 for images */
  data: string;
  /** Advisory content type */
  mime: string;
  /** Endpoint that produced the clip */
  source: ClipOrigin;
  /** Server write time (epoch seconds) */
  createdAt: number;
  /** Monotonic per-store write counter */
  revision: number;
}

/**
 * Decoded clip with the payload as raw bytes.
 */
export interface Clip {
  id: string;
  kind: ClipKind;
  payload: Uint8Array;
  mime: string;
  origin: ClipOrigin;
  createdAt: number;
  revision: number;
}

/**
 * The store's entire state: the latest clip, or nothing.
 */
export type StoreSlot = ClipRecord | null;

/**
 * Fields a writer supplies; the store fills in the rest.
 */
export interface ClipInput {
  type: ClipKind;
  data: string;
  mime?: string | null;
  source?: string | null;
}
