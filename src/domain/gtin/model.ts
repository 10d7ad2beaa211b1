// ---------------------------------------------------------------------------
// GTIN value construction, naming, equality and text rendering
// ---------------------------------------------------------------------------

import type {
  Digit,
  GtinFormat,
  GtinOf,
  GtinResult,
  GTIN,
} from "../../core/types.js";
import { InvalidChecksumError, InvalidLengthError } from "../../core/errors.js";
import { verifyCheckDigit } from "./check-digit.js";
import { digitsToString, isDigit } from "./digits.js";

/** Digit count of every format, check digit included. */
export const GTIN_LENGTHS = {
  UpcE: 8,
  UpcA: 12,
  Ean8: 8,
  Ean13: 13,
  Gtin14: 14,
} as const satisfies Record<GtinFormat, number>;

export const FORMAT_NAMES = {
  UpcE: "UPC-E",
  UpcA: "UPC-A",
  Ean8: "EAN-8",
  Ean13: "EAN-13",
  Gtin14: "GTIN-14",
} as const satisfies Record<GtinFormat, string>;

export function isGtinFormat(value: string): value is GtinFormat {
  return Object.hasOwn(GTIN_LENGTHS, value);
}

/**
 * Build a GTIN value of the given format from raw digits.
 *
 * The digits must already have the format's length and end in a valid
 * check digit; the stored array is a frozen copy.
 */
export function createGtin<F extends GtinFormat>(
  format: F,
  digits: readonly Digit[],
): GtinResult<GtinOf<F>> {
  if (digits.length !== GTIN_LENGTHS[format]) {
    return { ok: false, error: new InvalidLengthError(digits.length) };
  }
  if (!verifyCheckDigit(digits)) {
    return { ok: false, error: new InvalidChecksumError() };
  }
  return { ok: true, value: { format, digits: Object.freeze([...digits]) } };
}

/** Display name of the format, e.g. "UPC-A". */
export function formatName(gtin: GTIN): string {
  return FORMAT_NAMES[gtin.format];
}

/** Number of digits. Always 8 to 14. */
export function gtinLength(gtin: GTIN): number {
  return gtin.digits.length;
}

/** Canonical text form: the digits with no separators. */
export function toText(gtin: GTIN): string {
  return digitsToString(gtin.digits);
}

/**
 * Group the digits the way they are printed under the bars.
 *
 * UPC-A `0 71720 53977 4`, UPC-E `0 123450 3`, EAN-8 `5201 3485`,
 * EAN-13 `8 595701 530526`, GTIN-14 `1 23 45678 90123 1`.
 */
export function formatGtin(gtin: GTIN): string {
  const s = toText(gtin);
  switch (gtin.format) {
    case "UpcA":
      return `${s[0]} ${s.slice(1, 6)} ${s.slice(6, 11)} ${s[11]}`;
    case "UpcE":
      return `${s[0]} ${s.slice(1, 7)} ${s[7]}`;
    case "Ean8":
      return `${s.slice(0, 4)} ${s.slice(4, 8)}`;
    case "Ean13":
      return `${s[0]} ${s.slice(1, 7)} ${s.slice(7, 13)}`;
    case "Gtin14":
      return `${s[0]} ${s.slice(1, 3)} ${s.slice(3, 8)} ${s.slice(8, 13)} ${s[13]}`;
  }
}

/** Two GTINs are equal when both format and digits match. */
export function gtinEquals(a: GTIN, b: GTIN): boolean {
  if (a.format !== b.format) return false;
  if (a.digits.length !== b.digits.length) return false;
  return a.digits.every((d, i) => d === b.digits[i]);
}

/** Runtime check for a well-formed GTIN value (e.g. inside a payload). */
export function isGtin(value: unknown): value is GTIN {
  if (typeof value !== "object" || value === null) return false;
  if (!("format" in value) || !("digits" in value)) return false;

  const { format, digits } = value;
  if (typeof format !== "string" || !isGtinFormat(format)) return false;
  if (!Array.isArray(digits) || digits.length !== GTIN_LENGTHS[format]) {
    return false;
  }
  if (!digits.every((d: unknown) => typeof d === "number" && isDigit(d))) {
    return false;
  }
  return verifyCheckDigit(digits);
}
