import { ClipKind } from "../models/enums";
import type { ClipboardCapability, LocalClip } from "./types";

export interface MemoryClipboard extends ClipboardCapability {
  /** Simulate the user copying something. */
  set(kind: ClipKind, payload: Uint8Array | string): void;
  setText(text: string): void;
  clear(): void;
  peek(): LocalClip | null;
  onWrite(cb: (clip: LocalClip) => void): void;
}

/**
 * In-process clipboard for headless endpoints and tests.
 */
export function createMemoryClipboard(initial: LocalClip | null = null): MemoryClipboard {
  let current: LocalClip | null = initial;
  const writeHandlers: Array<(clip: LocalClip) => void> = [];

  function set(kind: ClipKind, payload: Uint8Array | string) {
    current = {
      kind,
      payload: typeof payload === "string" ? Buffer.from(payload, "utf8") : payload,
    };
  }

  return {
    async read() {
      return current;
    },
    async write(kind: ClipKind, payload: Uint8Array) {
      set(kind, payload);
      const written: LocalClip = { kind, payload };
      writeHandlers.forEach((h) => h(written));
    },
    set,
    setText: (text: string) => set(ClipKind.Text, text),
    clear: () => {
      current = null;
    },
    peek: () => current,
    onWrite: (cb) => writeHandlers.push(cb),
  };
}
