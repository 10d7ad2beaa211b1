import type { BatchItemResult } from "../../core/types.js";
import type { PrefixRegistry } from "../../config/prefix-registry.js";
import { defaultPrefixRegistry } from "../../config/prefix-registry.js";
import type { EightDigitOverride } from "../../domain/gtin/gtin.js";
import { parseGtinWith } from "../../domain/gtin/gtin.js";
import { describeGtin, describeGtinError } from "../../domain/gtin/describe.js";

export interface ClassificationSummary {
  total: number;
  valid: number;
  invalid: number;
  /** Keyed by display name, e.g. "UPC-A". */
  byFormat: Record<string, number>;
  /** Keyed by country code; codes without one count under "none". */
  byCountry: Record<string, number>;
  byErrorKind: Record<string, number>;
}

export function classifyCodes(
  codes: readonly string[],
  override?: EightDigitOverride,
  registry: PrefixRegistry = defaultPrefixRegistry(),
): BatchItemResult[] {
  return codes.map((input): BatchItemResult => {
    const parsed = parseGtinWith(input, override);
    return parsed.ok
      ? { input, ok: true, gtin: describeGtin(parsed.value, registry) }
      : { input, ok: false, error: describeGtinError(parsed.error) };
  });
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function summarize(
  results: readonly BatchItemResult[],
): ClassificationSummary {
  const summary: ClassificationSummary = {
    total: results.length,
    valid: 0,
    invalid: 0,
    byFormat: {},
    byCountry: {},
    byErrorKind: {},
  };

  for (const result of results) {
    if (result.ok) {
      summary.valid++;
      increment(summary.byFormat, result.gtin.formatName);
      increment(summary.byCountry, result.gtin.countryCode ?? "none");
    } else {
      summary.invalid++;
      increment(summary.byErrorKind, result.error.kind);
    }
  }

  return summary;
}

function section(title: string, counts: Record<string, number>): string[] {
  const entries = Object.entries(counts).sort(
    ([a, x], [b, y]) => y - x || a.localeCompare(b),
  );
  if (entries.length === 0) return [];
  return [
    "",
    `${title}:`,
    ...entries.map(([key, count]) => `  ${key.padEnd(18)}${count}`),
  ];
}

/** Plain-text report, one item per line. */
export function formatSummary(summary: ClassificationSummary): string {
  return [
    `Codes:    ${summary.total}`,
    `Valid:    ${summary.valid}`,
    `Invalid:  ${summary.invalid}`,
    ...section("By format", summary.byFormat),
    ...section("By country", summary.byCountry),
    ...section("Errors", summary.byErrorKind),
  ].join("\n");
}
