// ---------------------------------------------------------------------------
// GS1 country prefix registry.
// Serves range lookups over a sorted prefix table: the built-in one, or a
// replacement read from YAML and validated with Zod.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { z } from "zod";
import { parse } from "yaml";
import type { CountryPrefixRange } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";
import { DEFAULT_COUNTRY_RANGES } from "./country-ranges.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

export const CountryPrefixRangeSchema = z
  .object({
    from: z.number().int().min(0).max(999),
    to: z.number().int().min(0).max(999),
    country: z
      .string()
      .regex(/^(?:[A-Z]{2}|KOSOVO)$/, "expected an ISO 3166-1 alpha-2 code"),
    name: z.string().min(1).optional(),
  })
  .refine((range) => range.from <= range.to, {
    message: "range start must not exceed range end",
  });

export const PrefixTableSchema = z.object({
  ranges: z.array(CountryPrefixRangeSchema).min(1),
});

// ── Registry ────────────────────────────────────────────────────────────────

/**
 * Immutable set of non-overlapping prefix ranges.
 * Throws {@link ConfigurationError} if two ranges overlap.
 */
export class PrefixRegistry {
  readonly entries: readonly CountryPrefixRange[];

  constructor(ranges: readonly CountryPrefixRange[]) {
    const sorted = [...ranges]
      .map((r) => Object.freeze({ ...r }))
      .sort((a, b) => a.from - b.from);

    for (let i = 1; i < sorted.length; i++) {
      const prev = sorted[i - 1];
      const curr = sorted[i];
      if (curr.from <= prev.to) {
        throw new ConfigurationError(
          `GS1 prefix ranges overlap: ${prev.from}-${prev.to} (${prev.country}) and ${curr.from}-${curr.to} (${curr.country})`,
        );
      }
    }

    this.entries = Object.freeze(sorted);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Country code for a numeric prefix (0-999), or `null` if unassigned. */
  lookup(prefix: number): string | null {
    let lo = 0;
    let hi = this.entries.length - 1;

    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const range = this.entries[mid];
      if (prefix < range.from) {
        hi = mid - 1;
      } else if (prefix > range.to) {
        lo = mid + 1;
      } else {
        return range.country;
      }
    }

    return null;
  }
}

// ── Public API ──────────────────────────────────────────────────────────────

/**
 * Load and validate a prefix table from a YAML file.
 */
export function loadPrefixRegistry(filePath: string): PrefixRegistry {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read GS1 prefix table: ${filePath}`,
      { cause: err },
    );
  }

  let document: unknown;
  try {
    document = parse(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Malformed YAML in GS1 prefix table: ${filePath}`,
      { cause: err },
    );
  }

  const result = PrefixTableSchema.safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(
      `Invalid GS1 prefix table ${filePath}: ${issues}`,
      { cause: result.error },
    );
  }

  return new PrefixRegistry(result.data.ranges);
}

const DEFAULT_REGISTRY = new PrefixRegistry(DEFAULT_COUNTRY_RANGES);

/** The built-in table. Never touches the filesystem. */
export function defaultPrefixRegistry(): PrefixRegistry {
  return DEFAULT_REGISTRY;
}

/**
 * The registry a process should use: the YAML table at `filePath` when one
 * is configured, the built-in table otherwise.
 */
export function resolvePrefixRegistry(filePath: string | null): PrefixRegistry {
  return filePath === null ? DEFAULT_REGISTRY : loadPrefixRegistry(filePath);
}
