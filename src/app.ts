// ---------------------------------------------------------------------------
// GTIN Inspector -- application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import type pino from "pino";

import type { AppConfig } from "./core/types.js";
import { loadConfig } from "./config/config.js";
import { resolvePrefixRegistry } from "./config/prefix-registry.js";
import { createLogger } from "./logging/logger.js";
import { createApp } from "./api/server.js";
import type { AppEnv } from "./api/env.js";

export interface BuiltApp {
  app: Hono<AppEnv>;
  config: AppConfig;
  logger: pino.Logger;
}

/**
 * Load configuration and the prefix table, then wire the HTTP app.
 * Configuration problems surface here as `ConfigurationError`.
 */
export function buildApp(config: AppConfig = loadConfig()): BuiltApp {
  const logger = createLogger(config.logging);

  const registry = resolvePrefixRegistry(config.gtin.prefixTablePath);
  logger.info(
    { path: config.gtin.prefixTablePath ?? "built-in", ranges: registry.size },
    "GS1 prefix table loaded",
  );

  const app = createApp({
    env: config.env,
    registry,
    logger,
    rateLimitConfig: config.rateLimit,
    maxBatchSize: config.gtin.maxBatchSize,
  });

  return { app, config, logger };
}
