// ---------------------------------------------------------------------------
// Hono error handler: maps domain errors to HTTP responses.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type { AppConfig } from "../../core/types.js";
import { GtinValidationError } from "../../core/errors.js";
import { describeGtinError } from "../../domain/gtin/describe.js";
import type { AppEnv } from "../env.js";

/**
 * Build the `onError` handler for the configured environment.
 *
 * Mapping:
 * - `GtinValidationError` -> 400 Bad Request
 * - Everything else       -> 500 Internal Server Error
 *
 * In production the message of an unexpected error is replaced by a generic
 * one. GTIN validation messages only echo the caller's own input.
 */
export function createErrorHandler(
  env: AppConfig["env"],
): (err: Error, c: Context<AppEnv>) => Response {
  const hideInternals = env === "production";

  return (err, c) => {
    if (err instanceof GtinValidationError) {
      const { kind, length } = describeGtinError(err.gtinError);
      return c.json(
        {
          error: err.message,
          type: "gtin_validation_error",
          kind,
          ...(length !== undefined ? { length } : {}),
        },
        400,
      );
    }

    c.get("logger")?.error({ err }, "unhandled error");

    const message = hideInternals ? "Internal server error" : err.message;
    return c.json({ error: message, type: "internal_error" }, 500);
  };
}
