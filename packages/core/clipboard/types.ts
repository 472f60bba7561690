import { ClipKind } from "../models/enums";

/**
 * Content read from, or written to, an endpoint's clipboard.
 */
export interface LocalClip {
  kind: ClipKind;
  payload: Uint8Array;
  mime?: string;
}

/**
 * OS clipboard boundary. `read` resolves null when the clipboard is empty or
 * holds something other than text or an image.
 */
export interface ClipboardCapability {
  read(): Promise<LocalClip | null>;
  write(kind: ClipKind, payload: Uint8Array): Promise<void>;
}

export function isEmptyClip(clip: LocalClip | null): clip is null {
  return clip === null || clip.payload.byteLength === 0;
}
