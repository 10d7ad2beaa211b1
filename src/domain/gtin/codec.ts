// ---------------------------------------------------------------------------
// Interchange encoding: GTINs travel as their canonical digit string.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { GTIN, GtinResult } from "../../core/types.js";
import { GtinDecodeError, InvalidLengthError } from "../../core/errors.js";
import { parseGtin } from "./gtin.js";
import { isGtin, toText } from "./model.js";

export function encodeGtin(gtin: GTIN): string {
  return toText(gtin);
}

/**
 * Decode an interchange value through the full parse pipeline, so
 * separators and a stripped UPC-A leading zero are accepted.
 */
export function decodeGtin(value: unknown): GtinResult<GTIN> {
  if (typeof value !== "string") {
    return {
      ok: false,
      error: new GtinDecodeError(value === null ? "null" : typeof value),
    };
  }
  return parseGtin(value);
}

/**
 * `JSON.stringify` replacer that writes every GTIN in a payload as its
 * canonical string.
 */
export function gtinJsonReplacer(_key: string, value: unknown): unknown {
  return isGtin(value) ? encodeGtin(value) : value;
}

/**
 * Zod schema for a GTIN field: accepts text, outputs a validated GTIN.
 * Failures carry the error `kind` (and `length`) in the issue params.
 */
export const gtinSchema = z.string().transform((raw, ctx): GTIN => {
  const parsed = parseGtin(raw);
  if (parsed.ok) return parsed.value;

  const { error } = parsed;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: error.message,
    params: {
      kind: error.kind,
      ...(error instanceof InvalidLengthError ? { length: error.length } : {}),
    },
  });
  return z.NEVER;
});
