// ---------------------------------------------------------------------------
// GS1 mod-10 check-digit computation
// ---------------------------------------------------------------------------

import type { Digit } from "../../core/types.js";
import { toDigit } from "./digits.js";

/** Shortest and longest digit sequences (check digit included) that validate. */
export const MIN_GTIN_LENGTH = 8;
export const MAX_GTIN_LENGTH = 14;

/**
 * Compute the GS1 check digit for `body` (all digits except the check digit).
 *
 * Weights alternate 3, 1, 3, ... starting from the rightmost digit, so the
 * same function serves every GTIN length.
 */
export function computeCheckDigit(body: readonly Digit[]): Digit {
  let sum = 0;
  for (let i = 0; i < body.length; i++) {
    const digit = body[body.length - 1 - i];
    sum += i % 2 === 0 ? digit * 3 : digit;
  }

  return toDigit((10 - (sum % 10)) % 10);
}

/**
 * Verify that a full digit sequence (8 to 14 digits) ends in a valid
 * check digit. Any other length is rejected.
 */
export function verifyCheckDigit(digits: readonly Digit[]): boolean {
  if (digits.length < MIN_GTIN_LENGTH || digits.length > MAX_GTIN_LENGTH) {
    return false;
  }
  const checkIndex = digits.length - 1;
  return digits[checkIndex] === computeCheckDigit(digits.slice(0, checkIndex));
}
