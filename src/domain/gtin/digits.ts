// ---------------------------------------------------------------------------
// Digit extraction and rendering
// ---------------------------------------------------------------------------

import type { Digit } from "../../core/types.js";

const ZERO = "0".charCodeAt(0);

/** Type guard for a number in 0..9. */
export function isDigit(n: number): n is Digit {
  return Number.isInteger(n) && n >= 0 && n <= 9;
}

/**
 * Narrow a number to a `Digit`.
 * Throws `RangeError` for anything outside 0..9.
 */
export function toDigit(n: number): Digit {
  if (!isDigit(n)) {
    throw new RangeError(`Expected a decimal digit, got ${n}`);
  }
  return n;
}

/**
 * Keep only the ASCII digits of `text`, in order, as numeric values.
 * Never fails: empty or over-long results are validated downstream.
 */
export function extractDigits(text: string): Digit[] {
  const digits: Digit[] = [];
  for (let i = 0; i < text.length; i++) {
    const value = text.charCodeAt(i) - ZERO;
    if (isDigit(value)) digits.push(value);
  }
  return digits;
}

/** Concatenate digits with no separators. */
export function digitsToString(digits: readonly Digit[]): string {
  return digits.join("");
}
