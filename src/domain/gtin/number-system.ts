// ---------------------------------------------------------------------------
// GS1 prefix, number-system and country classification
// ---------------------------------------------------------------------------

import type { Digit, GTIN, Gs1Prefix } from "../../core/types.js";
import { NumberSystem } from "../../core/types.js";
import type { PrefixRegistry } from "../../config/prefix-registry.js";
import { defaultPrefixRegistry } from "../../config/prefix-registry.js";
import { expandUpcE } from "./upc-e.js";

interface NumberSystemRange {
  from: number;
  to: number;
  system: NumberSystem;
}

/** Checked in order; anything unmatched is general merchandise. */
const NUMBER_SYSTEM_RANGES: readonly NumberSystemRange[] = Object.freeze([
  { from: 20, to: 29, system: NumberSystem.STORE_USE },
  { from: 30, to: 39, system: NumberSystem.DRUG },
  { from: 40, to: 49, system: NumberSystem.STORE_USE },
  { from: 50, to: 59, system: NumberSystem.COUPON },
  { from: 200, to: 299, system: NumberSystem.STORE_USE },
  { from: 977, to: 977, system: NumberSystem.ISSN },
  { from: 978, to: 979, system: NumberSystem.ISBN },
  { from: 980, to: 980, system: NumberSystem.REFUND },
  { from: 981, to: 984, system: NumberSystem.COUPON },
  { from: 990, to: 999, system: NumberSystem.COUPON },
]);

/** Number systems that never carry a country. */
const COUNTRYLESS: ReadonlySet<NumberSystem> = new Set<NumberSystem>([
  NumberSystem.STORE_USE,
  NumberSystem.COUPON,
  NumberSystem.ISBN,
  NumberSystem.ISSN,
  NumberSystem.REFUND,
]);

// ── Prefix ──────────────────────────────────────────────────────────────────

/**
 * The three digits that identify the issuing GS1 range.
 *
 * UPC-A and UPC-E are read as zero-padded EAN-13s; GTIN-14 skips its
 * packaging indicator. `null` only when a UPC-E cannot be expanded.
 */
export function gs1Prefix(gtin: GTIN): Gs1Prefix | null {
  const d = gtin.digits;
  switch (gtin.format) {
    case "Ean13":
    case "Ean8":
      return [d[0], d[1], d[2]];
    case "UpcA":
      return [0, d[0], d[1]];
    case "UpcE": {
      const upcA = expandUpcE(d);
      if (!upcA.ok) return null;
      const u = upcA.value.digits;
      return [0, u[0], u[1]];
    }
    case "Gtin14":
      return [d[1], d[2], d[3]];
  }
}

/** Numeric value of a prefix, 0-999. */
export function prefixValue(prefix: Gs1Prefix): number {
  return prefix[0] * 100 + prefix[1] * 10 + prefix[2];
}

// ── Number system ───────────────────────────────────────────────────────────

/** Classify a prefix; anything other than exactly three digits is unknown. */
export function numberSystemFromPrefix(prefix: readonly Digit[]): NumberSystem {
  if (prefix.length !== 3) return NumberSystem.UNKNOWN;

  const value = prefixValue([prefix[0], prefix[1], prefix[2]]);
  const range = NUMBER_SYSTEM_RANGES.find(
    (r) => value >= r.from && value <= r.to,
  );
  return range?.system ?? NumberSystem.GENERAL;
}

export function numberSystem(gtin: GTIN): NumberSystem {
  const prefix = gs1Prefix(gtin);
  return prefix ? numberSystemFromPrefix(prefix) : NumberSystem.UNKNOWN;
}

// ── Country ─────────────────────────────────────────────────────────────────

/**
 * ISO 3166-1 alpha-2 code of the GS1 organisation that issued the prefix.
 *
 * Drug codes (NDC) are always US. Store-use, coupon, ISBN, ISSN and refund
 * codes belong to no country.
 */
export function countryCode(
  gtin: GTIN,
  registry: PrefixRegistry = defaultPrefixRegistry(),
): string | null {
  const prefix = gs1Prefix(gtin);
  if (!prefix) return null;

  const system = numberSystemFromPrefix(prefix);
  if (system === NumberSystem.DRUG) return "US";
  if (COUNTRYLESS.has(system)) return null;

  return registry.lookup(prefixValue(prefix));
}
