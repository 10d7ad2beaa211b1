// ---------------------------------------------------------------------------
// Health check routes.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { PrefixRegistry } from "../../config/prefix-registry.js";
import type { AppEnv } from "../env.js";

/** Dependencies required by health routes. */
export interface HealthRouteDeps {
  registry: PrefixRegistry;
}

const startedAt = Date.now();

/**
 * Mounts `GET /health`, a liveness probe that also reports how many
 * country prefix ranges are loaded.
 */
export function healthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/", (c) => {
    const uptimeMs = Date.now() - startedAt;
    return c.json({
      status: "ok",
      uptime: uptimeMs,
      timestamp: new Date().toISOString(),
      prefixRanges: deps.registry.size,
    });
  });

  return app;
}
