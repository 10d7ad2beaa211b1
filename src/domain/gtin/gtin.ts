// ---------------------------------------------------------------------------
// GTIN parsing, format classification and EAN-13 conversion
// ---------------------------------------------------------------------------

import type {
  Digit,
  Ean8,
  Ean13,
  GTIN,
  GtinResult,
  RawGtin,
  UpcE,
} from "../../core/types.js";
import {
  InvalidChecksumError,
  InvalidLengthError,
} from "../../core/errors.js";
import {
  MAX_GTIN_LENGTH,
  MIN_GTIN_LENGTH,
  verifyCheckDigit,
} from "./check-digit.js";
import { extractDigits } from "./digits.js";
import { createGtin } from "./model.js";
import { expandUpcE } from "./upc-e.js";

// ── Classification ──────────────────────────────────────────────────────────

/**
 * Parse arbitrary text into a GTIN.
 *
 * Every non-digit character is discarded first, so `"0 71720 53977 4"`
 * and `"071720539774"` are the same input. The format is chosen by digit
 * count:
 *
 * - 8: UPC-E when the first digit is 0, EAN-8 otherwise. Nothing in the
 *   digits themselves tells the two apart; use {@link parseAsEan8} or
 *   {@link parseAsUpcE} when the caller knows better.
 * - 11: a UPC-A whose leading zero was stripped somewhere upstream.
 * - 12: UPC-A.
 * - 13: UPC-A when zero-padded, EAN-13 otherwise.
 * - 14: GTIN-14.
 */
export function parseGtin(raw: RawGtin): GtinResult<GTIN> {
  const digits = extractDigits(raw);

  if (!verifyCheckDigit(digits)) {
    if (digits.length < MIN_GTIN_LENGTH || digits.length > MAX_GTIN_LENGTH) {
      return { ok: false, error: new InvalidLengthError(digits.length) };
    }
    return { ok: false, error: new InvalidChecksumError() };
  }

  switch (digits.length) {
    case 8:
      return digits[0] === 0
        ? createGtin("UpcE", digits)
        : createGtin("Ean8", digits);
    case 11:
      return createGtin("UpcA", [0, ...digits]);
    case 12:
      return createGtin("UpcA", digits);
    case 13:
      // Zero-padded UPC-A collapses back to UPC-A; the reverse never happens.
      return digits[0] === 0
        ? createGtin("UpcA", digits.slice(1))
        : createGtin("Ean13", digits);
    case 14:
      return createGtin("Gtin14", digits);
    default:
      return { ok: false, error: new InvalidLengthError(digits.length) };
  }
}

// ── Explicit 8-digit overrides ──────────────────────────────────────────────

function parseEightDigits(raw: RawGtin): GtinResult<readonly Digit[]> {
  const digits = extractDigits(raw);
  if (digits.length !== 8) {
    return { ok: false, error: new InvalidLengthError(digits.length) };
  }
  if (!verifyCheckDigit(digits)) {
    return { ok: false, error: new InvalidChecksumError() };
  }
  return { ok: true, value: digits };
}

/** Parse an 8-digit code as EAN-8 whatever its leading digit. */
export function parseAsEan8(raw: RawGtin): GtinResult<Ean8> {
  const digits = parseEightDigits(raw);
  return digits.ok ? createGtin("Ean8", digits.value) : digits;
}

/** Parse an 8-digit code as UPC-E whatever its leading digit. */
export function parseAsUpcE(raw: RawGtin): GtinResult<UpcE> {
  const digits = parseEightDigits(raw);
  return digits.ok ? createGtin("UpcE", digits.value) : digits;
}

// ── Conversion ──────────────────────────────────────────────────────────────

/**
 * Convert to EAN-13 where that loses nothing.
 *
 * UPC-A gains a leading zero; UPC-E is expanded to UPC-A first. EAN-8 and
 * GTIN-14 have no EAN-13 equivalent and give `null`.
 */
export function asEan13(gtin: GTIN): Ean13 | null {
  switch (gtin.format) {
    case "Ean13":
      return gtin;
    case "UpcA":
      return padToEan13(gtin.digits);
    case "UpcE": {
      const upcA = expandUpcE(gtin.digits);
      return upcA.ok ? padToEan13(upcA.value.digits) : null;
    }
    case "Ean8":
    case "Gtin14":
      return null;
  }
}

function padToEan13(upcADigits: readonly Digit[]): Ean13 | null {
  const ean13 = createGtin("Ean13", [0, ...upcADigits]);
  return ean13.ok ? ean13.value : null;
}

// ── Caller-selected parsing ─────────────────────────────────────────────────

/** How a caller resolves the 8-digit UPC-E / EAN-8 ambiguity. */
export const EIGHT_DIGIT_OVERRIDES = ["ean8", "upce"] as const;
export type EightDigitOverride = (typeof EIGHT_DIGIT_OVERRIDES)[number];

/**
 * {@link parseGtin}, or one of the forced 8-digit parsers when the caller
 * has said which format to expect.
 */
export function parseGtinWith(
  raw: RawGtin,
  override?: EightDigitOverride,
): GtinResult<GTIN> {
  switch (override) {
    case "ean8":
      return parseAsEan8(raw);
    case "upce":
      return parseAsUpcE(raw);
    case undefined:
      return parseGtin(raw);
  }
}
