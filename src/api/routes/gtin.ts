// ---------------------------------------------------------------------------
// GTIN routes: single lookup, batch classification, UPC-E expansion.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import { z } from "zod";
import type { BatchItemResult } from "../../core/types.js";
import { GtinValidationError } from "../../core/errors.js";
import type { PrefixRegistry } from "../../config/prefix-registry.js";
import { digitsToString, extractDigits } from "../../domain/gtin/digits.js";
import {
  asEan13,
  EIGHT_DIGIT_OVERRIDES,
  parseGtinWith,
} from "../../domain/gtin/gtin.js";
import { describeGtin, describeGtinError } from "../../domain/gtin/describe.js";
import { toText } from "../../domain/gtin/model.js";
import { expandUpcE } from "../../domain/gtin/upc-e.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by GTIN routes. */
export interface GtinRouteDeps {
  registry: PrefixRegistry;
  logger: pino.Logger;
  maxBatchSize: number;
}

const OverrideSchema = z.enum(EIGHT_DIGIT_OVERRIDES).optional();

/**
 * Mounts GTIN endpoints:
 *
 * - `GET  /gtin?code=<text>[&as=ean8|upce]` -- Parse and describe one code.
 * - `POST /gtin/batch`                      -- Classify up to N codes.
 * - `GET  /gtin/expand?upce=<text>`         -- Expand a UPC-E to UPC-A.
 */
export function gtinRoutes(deps: GtinRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  const BatchRequestSchema = z.object({
    codes: z.array(z.string()).min(1).max(deps.maxBatchSize),
    as: OverrideSchema,
  });

  // ── GET /gtin?code= ──────────────────────────────────────────────────

  app.get("/", (c) => {
    const code = c.req.query("code");
    if (!code) {
      return c.json(
        { error: "Missing required query parameter: code", type: "validation_error" },
        400,
      );
    }

    const override = OverrideSchema.safeParse(c.req.query("as"));
    if (!override.success) {
      return c.json(
        {
          error: `Query parameter "as" must be one of: ${EIGHT_DIGIT_OVERRIDES.join(", ")}`,
          type: "validation_error",
        },
        400,
      );
    }

    const parsed = parseGtinWith(code, override.data);
    if (!parsed.ok) {
      deps.logger.debug({ code, kind: parsed.error.kind }, "GTIN rejected");
      throw new GtinValidationError(code, parsed.error);
    }

    return c.json(describeGtin(parsed.value, deps.registry));
  });

  // ── POST /gtin/batch ─────────────────────────────────────────────────

  app.post("/batch", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        { error: "Request body must be valid JSON", type: "validation_error" },
        400,
      );
    }

    const request = BatchRequestSchema.safeParse(body);
    if (!request.success) {
      return c.json(
        {
          error: `Body must be { codes: string[] } with 1-${deps.maxBatchSize} entries`,
          type: "validation_error",
        },
        400,
      );
    }

    const results = request.data.codes.map((input): BatchItemResult => {
      const parsed = parseGtinWith(input, request.data.as);
      return parsed.ok
        ? { input, ok: true, gtin: describeGtin(parsed.value, deps.registry) }
        : { input, ok: false, error: describeGtinError(parsed.error) };
    });

    const valid = results.filter((r) => r.ok).length;
    deps.logger.info(
      { total: results.length, valid },
      "batch classified",
    );

    return c.json({
      total: results.length,
      valid,
      invalid: results.length - valid,
      results,
    });
  });

  // ── GET /gtin/expand?upce= ───────────────────────────────────────────

  app.get("/expand", (c) => {
    const upce = c.req.query("upce");
    if (!upce) {
      return c.json(
        { error: "Missing required query parameter: upce", type: "validation_error" },
        400,
      );
    }

    const digits = extractDigits(upce);
    const upcA = expandUpcE(digits);
    if (!upcA.ok) {
      throw new GtinValidationError(upce, upcA.error);
    }

    const ean13 = asEan13(upcA.value);
    return c.json({
      upce: digitsToString(digits),
      upcA: toText(upcA.value),
      ean13: ean13 ? toText(ean13) : null,
    });
  });

  return app;
}
