// ---------------------------------------------------------------------------
// Core types for the GTIN Inspector service.
// All other modules import from this file.
// ---------------------------------------------------------------------------

import type { GtinError } from "./errors.js";

// ── Primitives ──────────────────────────────────────────────────────────────

/** A single decimal digit. */
export type Digit = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/** Unvalidated barcode input (scanner output, spreadsheet cell, ...). */
export type RawGtin = string;

// ── Enums ───────────────────────────────────────────────────────────────────

export const GtinFormat = {
  UPC_E: "UpcE",
  UPC_A: "UpcA",
  EAN_8: "Ean8",
  EAN_13: "Ean13",
  GTIN_14: "Gtin14",
} as const;
export type GtinFormat = (typeof GtinFormat)[keyof typeof GtinFormat];

export const NumberSystem = {
  GENERAL: "general",
  STORE_USE: "store_use",
  COUPON: "coupon",
  DRUG: "drug",
  ISSN: "issn",
  ISBN: "isbn",
  REFUND: "refund",
  UNKNOWN: "unknown",
} as const;
export type NumberSystem = (typeof NumberSystem)[keyof typeof NumberSystem];

// ── GTIN values ─────────────────────────────────────────────────────────────

/**
 * A validated GTIN of one specific format.
 *
 * `digits` is frozen and always has the length the format requires; its
 * last element is the GS1 check digit.
 */
export interface GtinOf<F extends GtinFormat> {
  readonly format: F;
  readonly digits: readonly Digit[];
}

export type UpcE = GtinOf<"UpcE">;
export type UpcA = GtinOf<"UpcA">;
export type Ean8 = GtinOf<"Ean8">;
export type Ean13 = GtinOf<"Ean13">;
export type Gtin14 = GtinOf<"Gtin14">;

/** Any validated GTIN. Discriminate on `format`. */
export type GTIN = { [F in GtinFormat]: GtinOf<F> }[GtinFormat];

/** Three leading digits identifying the issuing GS1 range. */
export type Gs1Prefix = readonly [Digit, Digit, Digit];

// ── Results ─────────────────────────────────────────────────────────────────

export type GtinResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: GtinError };

// ── Prefix registry ─────────────────────────────────────────────────────────

/** An inclusive range of numeric GS1 prefixes assigned to one country. */
export interface CountryPrefixRange {
  from: number;
  to: number;
  /** ISO 3166-1 alpha-2 code, or KOSOVO, which has none. */
  country: string;
  name?: string;
}

// ── API payloads ────────────────────────────────────────────────────────────

export interface GtinDescription {
  code: string;
  format: GtinFormat;
  formatName: string;
  length: number;
  display: string;
  gs1Prefix: string | null;
  numberSystem: NumberSystem;
  countryCode: string | null;
  ean13: string | null;
}

export interface GtinErrorDescription {
  kind: GtinError["kind"];
  message: string;
  length?: number;
}

export type BatchItemResult =
  | { input: string; ok: true; gtin: GtinDescription }
  | { input: string; ok: false; error: GtinErrorDescription };

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "staging" | "production";
  port: number;
  logging: LoggingConfig;
  rateLimit: RateLimitConfig;
  gtin: GtinConfig;
}

export interface LoggingConfig {
  level: string;
  prettyPrint: boolean;
}

export interface RateLimitConfig {
  enabled: boolean;
  requestsPerMinute: number;
  /** Key clients by X-Forwarded-For / X-Real-IP (only behind a proxy). */
  trustProxy: boolean;
}

export interface GtinConfig {
  maxBatchSize: number;
  /** YAML table replacing the built-in country prefixes, if any. */
  prefixTablePath: string | null;
}
