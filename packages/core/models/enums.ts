/**
 * Kinds of clipboard content the store accepts.
 */
export enum ClipKind {
  Text = "text",
  Image = "image",
}

/**
 * Endpoint that produced a clip.
 */
export enum ClipOrigin {
  Desktop = "desktop",
  Phone = "phone",
  Unknown = "unknown",
}

/**
 * Which side produced an engine's most recent state transition.
 */
export enum ActionOrigin {
  None = "none",
  Local = "local",
  Remote = "remote",
}

export const DEFAULT_MIME: Record<ClipKind, string> = {
  [ClipKind.Text]: "text/plain",
  [ClipKind.Image]: "image/png",
};

/**
 * Map a free-form `source` string onto an origin. Absent or blank means
 * `desktop`; anything unrecognized is `unknown`.
 */
export function toClipOrigin(value: string | null | undefined): ClipOrigin {
  const normalized = (value ?? "").trim().toLowerCase();
  if (normalized === "") return ClipOrigin.Desktop;
  if (normalized === ClipOrigin.Desktop) return ClipOrigin.Desktop;
  if (normalized === ClipOrigin.Phone) return ClipOrigin.Phone;
  return ClipOrigin.Unknown;
}
