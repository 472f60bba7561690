import { z } from "zod";
import type { ClipInput, ClipRecord } from "./Clip";
import { ClipKind, ClipOrigin } from "./enums";

/**
 * Shape of a stored / served clip. Documents written before `id` and
 * `revision` existed still parse.
 */
export const clipRecordSchema: z.ZodType<ClipRecord, z.ZodTypeDef, unknown> = z.object({
  id: z.string().default(""),
  type: z.nativeEnum(ClipKind),
  data: z.string(),
  mime: z.string(),
  source: z.nativeEnum(ClipOrigin),
  createdAt: z.number().int().nonnegative(),
  revision: z.number().int().nonnegative().default(0),
});

export const KIND_ERROR = "type must be 'text' or 'image'";
export const DATA_ERROR = "data is required";

/**
 * Body of `POST /clip`. Issues are reported in field order so the first one
 * is the message returned to the caller.
 */
export const clipUploadSchema = z.object({
  type: z.nativeEnum(ClipKind, { errorMap: () => ({ message: KIND_ERROR }) }),
  data: z.unknown().refine((value) => value !== undefined && value !== null, {
    message: DATA_ERROR,
  }),
  mime: z.string({ invalid_type_error: "mime must be a string" }).nullish(),
  source: z.string({ invalid_type_error: "source must be a string" }).nullish(),
});

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function parseClipUpload(body: unknown): ParseResult<ClipInput> {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return { ok: false, error: "Body must be a JSON object" };
  }
  const parsed = clipUploadSchema.safeParse(body);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return { ok: false, error: first?.message ?? "Invalid clip" };
  }
  const { type, data, mime, source } = parsed.data;
  return {
    ok: true,
    value: {
      type,
      // non-string JSON values are kept as their JSON text
      data: typeof data === "string" ? data : JSON.stringify(data),
      mime,
      source,
    },
  };
}

export function parseClipRecord(value: unknown): ParseResult<ClipRecord> {
  const parsed = clipRecordSchema.safeParse(value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.length ? `${first.path.join(".")}: ` : "";
    return { ok: false, error: `${where}${first?.message ?? "invalid clip record"}` };
  }
  return { ok: true, value: parsed.data };
}
