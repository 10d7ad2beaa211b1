// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type pino from "pino";
import type { AppConfig, RateLimitConfig } from "../core/types.js";
import type { PrefixRegistry } from "../config/prefix-registry.js";
import type { AppEnv } from "./env.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { rateLimitMiddleware } from "./middleware/rate-limit.js";
import { createErrorHandler } from "./middleware/error-handler.js";

import { gtinRoutes } from "./routes/gtin.js";
import { healthRoutes } from "./routes/health.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  env: AppConfig["env"];
  registry: PrefixRegistry;
  logger: pino.Logger;
  rateLimitConfig: RateLimitConfig;
  maxBatchSize: number;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Per-client rate limiting.
 * 4. Route handlers.
 * 5. Global error handler (maps domain errors to HTTP status codes).
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // ── Global middleware ──────────────────────────────────────────────────

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));
  app.use("*", rateLimitMiddleware(deps.rateLimitConfig));

  // ── Routes ────────────────────────────────────────────────────────────

  app.get("/", (c) =>
    c.json({
      name: "gtin-inspector",
      routes: ["/health", "/gtin", "/gtin/batch", "/gtin/expand"],
    }),
  );

  app.route(
    "/gtin",
    gtinRoutes({
      registry: deps.registry,
      logger: deps.logger,
      maxBatchSize: deps.maxBatchSize,
    }),
  );

  app.route("/health", healthRoutes({ registry: deps.registry }));

  // ── Error handler ─────────────────────────────────────────────────────

  app.onError(createErrorHandler(deps.env));

  return app;
}
