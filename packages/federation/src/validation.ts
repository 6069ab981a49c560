/**
 * Per-entry validation for incoming knowledge.
 *
 * Batches are validated entry by entry so that one malformed entry becomes
 * a counted failure instead of aborting the whole batch.
 */

import { MalformedImportError } from "@tandem/errors";
import { z } from "zod";

const CONFIDENCE_RANGE_MESSAGE = "confidence must be within [0, 1]";

export const confidenceSchema = z
  .number({
    required_error: "confidence is required",
    invalid_type_error: "confidence must be a number",
  })
  .min(0, { message: CONFIDENCE_RANGE_MESSAGE })
  .max(1, { message: CONFIDENCE_RANGE_MESSAGE });

export const entryIdSchema = z
  .string({ required_error: "id is required", invalid_type_error: "id must be a string" })
  .min(1, { message: "id must not be empty" });

/**
 * Reference to an entry being synced. Only the identity and, when present,
 * the confidence are checked; other fields pass through untouched.
 */
export const syncEntryRefSchema = z
  .object(
    { id: entryIdSchema, confidence: confidenceSchema.optional() },
    { invalid_type_error: "entry must be an object", required_error: "entry must be an object" },
  )
  .passthrough();

export type SyncEntryRef = z.infer<typeof syncEntryRefSchema>;

export type EntryValidation<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: MalformedImportError };

/** Best-effort id of a raw entry, for error reporting. */
export function rawEntryId(raw: unknown): string | null {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    const id = raw.id;
    if (typeof id === "string" && id.length > 0) return id;
  }
  return null;
}

/**
 * Validate one raw entry against a schema, mapping failures to a
 * `MalformedImportError` carrying the entry's position.
 */
export function validateEntry<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  index: number,
): EntryValidation<T> {
  const result = schema.safeParse(raw);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return {
    ok: false,
    error: new MalformedImportError(
      index,
      rawEntryId(raw),
      result.error.issues.map((issue) => issue.message),
    ),
  };
}
