// ---------------------------------------------------------------------------
// Typed configuration loader.
// Reads from environment variables with sensible defaults.
// ---------------------------------------------------------------------------

import type { AppConfig } from "../core/types.js";
import { ConfigurationError } from "../core/errors.js";

const ENVIRONMENTS: readonly AppConfig["env"][] = [
  "development",
  "staging",
  "production",
];

function parseEnvName(value: string): AppConfig["env"] {
  const env = ENVIRONMENTS.find((e) => e === value);
  if (!env) {
    throw new ConfigurationError(
      `GTIN_INSPECTOR_ENV must be one of ${ENVIRONMENTS.join(", ")}, got "${value}"`,
    );
  }
  return env;
}

function parsePositiveInt(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(
      `${name} must be a positive integer, got "${value}"`,
    );
  }
  return parsed;
}

/**
 * Load the application configuration from environment variables.
 *
 * Every setting has a hard-coded default so the service can start with zero
 * configuration for local development.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  return {
    env: parseEnvName(env["GTIN_INSPECTOR_ENV"] ?? "development"),
    port: parsePositiveInt("PORT", env["PORT"] ?? "3000"),

    logging: {
      level: env["LOG_LEVEL"] ?? "info",
      prettyPrint: env["LOG_PRETTY"] === "true",
    },

    rateLimit: {
      enabled: env["RATE_LIMIT_ENABLED"] !== "false",
      requestsPerMinute: parsePositiveInt(
        "RATE_LIMIT_RPM",
        env["RATE_LIMIT_RPM"] ?? "120",
      ),
      trustProxy: env["TRUST_PROXY"] === "true",
    },

    gtin: {
      maxBatchSize: parsePositiveInt(
        "GTIN_MAX_BATCH_SIZE",
        env["GTIN_MAX_BATCH_SIZE"] ?? "500",
      ),
      prefixTablePath: env["GTIN_PREFIX_TABLE"] || null,
    },
  };
}
