import { createHash } from "node:crypto";

/**
 * Content hash used to detect clipboard changes. Not an integrity check.
 */
export function fingerprint(payload: Uint8Array): string {
  return createHash("sha256").update(payload).digest("hex");
}
