// ---------------------------------------------------------------------------
// Built-in GS1 member-organisation prefix ranges.
// ---------------------------------------------------------------------------

import type { CountryPrefixRange } from "../core/types.js";

/**
 * Numeric value of the first three digits of an EAN-13 (or 0 followed by
 * the first two digits of a UPC-A) mapped to the issuing country.
 *
 * Store-use, drug, coupon, ISBN, ISSN and refund ranges are classified
 * before this table is consulted and are not listed. The mapping is
 * approximate, not an authoritative GS1 registry.
 */
export const DEFAULT_COUNTRY_RANGES: readonly CountryPrefixRange[] = Object.freeze([
  { from: 0, to: 139, country: "US", name: "United States" },
  { from: 300, to: 379, country: "FR", name: "France" },
  { from: 380, to: 380, country: "BG", name: "Bulgaria" },
  { from: 383, to: 383, country: "SI", name: "Slovenia" },
  { from: 385, to: 385, country: "HR", name: "Croatia" },
  { from: 387, to: 387, country: "BA", name: "Bosnia and Herzegovina" },
  { from: 389, to: 389, country: "ME", name: "Montenegro" },
  // Kosovo has no ISO 3166-1 alpha-2 code.
  { from: 390, to: 390, country: "KOSOVO", name: "Kosovo" },
  { from: 400, to: 440, country: "DE", name: "Germany" },
  { from: 450, to: 459, country: "JP", name: "Japan" },
  { from: 460, to: 469, country: "RU", name: "Russia" },
  { from: 470, to: 470, country: "KG", name: "Kyrgyzstan" },
  { from: 471, to: 471, country: "TW", name: "Taiwan" },
  { from: 474, to: 474, country: "EE", name: "Estonia" },
  { from: 490, to: 499, country: "JP", name: "Japan" },
  { from: 500, to: 509, country: "GB", name: "United Kingdom" },
  { from: 520, to: 521, country: "GR", name: "Greece" },
  { from: 539, to: 539, country: "IE", name: "Ireland" },
  { from: 540, to: 549, country: "BE", name: "Belgium" },
  { from: 570, to: 579, country: "DK", name: "Denmark" },
  { from: 590, to: 590, country: "PL", name: "Poland" },
  { from: 599, to: 599, country: "HU", name: "Hungary" },
  { from: 618, to: 618, country: "CI", name: "Côte d'Ivoire" },
  { from: 619, to: 619, country: "TN", name: "Tunisia" },
  { from: 640, to: 649, country: "FI", name: "Finland" },
  { from: 700, to: 709, country: "NO", name: "Norway" },
  { from: 730, to: 739, country: "SE", name: "Sweden" },
  { from: 742, to: 742, country: "HN", name: "Honduras" },
  { from: 750, to: 750, country: "MX", name: "Mexico" },
  { from: 754, to: 755, country: "CA", name: "Canada" },
  { from: 759, to: 759, country: "VE", name: "Venezuela" },
  { from: 760, to: 769, country: "CH", name: "Switzerland" },
  { from: 773, to: 773, country: "UY", name: "Uruguay" },
  { from: 789, to: 790, country: "BR", name: "Brazil" },
  { from: 800, to: 839, country: "IT", name: "Italy" },
  { from: 840, to: 849, country: "ES", name: "Spain" },
  { from: 858, to: 858, country: "SK", name: "Slovakia" },
  { from: 859, to: 859, country: "CZ", name: "Czech Republic" },
  { from: 860, to: 860, country: "RS", name: "Serbia" },
  { from: 870, to: 879, country: "NL", name: "Netherlands" },
  { from: 885, to: 885, country: "TH", name: "Thailand" },
  { from: 888, to: 888, country: "SG", name: "Singapore" },
  { from: 900, to: 919, country: "AT", name: "Austria" },
  { from: 930, to: 939, country: "AU", name: "Australia" },
  { from: 940, to: 949, country: "NZ", name: "New Zealand" },
]);
