// ---------------------------------------------------------------------------
// Per-client fixed-window rate limiting.
// ---------------------------------------------------------------------------

import type { Context, Next } from "hono";
import type { RateLimitConfig } from "../../core/types.js";
import type { AppEnv } from "../env.js";

export const RATE_LIMIT_WINDOW_MS = 60_000;

/** Windows idle for this long are dropped by the sweep. */
const SWEEP_INTERVAL_MS = 5 * RATE_LIMIT_WINDOW_MS;

export type RateLimitDecision =
  | { allowed: true }
  | { allowed: false; retryAfterSeconds: number };

/**
 * Counts hits per key in one-minute windows that start at a key's first
 * hit. Time is passed in so callers (and tests) own the clock.
 */
export class FixedWindowCounter {
  private readonly windows = new Map<string, { start: number; hits: number }>();

  constructor(private readonly limit: number) {}

  get trackedKeys(): number {
    return this.windows.size;
  }

  hit(key: string, now: number): RateLimitDecision {
    let window = this.windows.get(key);
    if (!window || now - window.start >= RATE_LIMIT_WINDOW_MS) {
      window = { start: now, hits: 0 };
      this.windows.set(key, window);
    }

    window.hits++;
    if (window.hits <= this.limit) return { allowed: true };

    const remainingMs = window.start + RATE_LIMIT_WINDOW_MS - now;
    return { allowed: false, retryAfterSeconds: Math.ceil(remainingMs / 1000) };
  }

  /** Forget keys whose window ended before `now`. */
  sweep(now: number): void {
    for (const [key, window] of this.windows) {
      if (now - window.start >= RATE_LIMIT_WINDOW_MS) this.windows.delete(key);
    }
  }
}

/**
 * Rejects a client's requests past `requestsPerMinute` with 429 and a
 * `Retry-After` header. Clients are told apart by proxy headers only when
 * `trustProxy` is set; otherwise they share one budget.
 */
export function rateLimitMiddleware(
  config: RateLimitConfig,
): (c: Context<AppEnv>, next: Next) => Promise<Response | void> {
  const counter = new FixedWindowCounter(config.requestsPerMinute);

  if (config.enabled) {
    setInterval(() => counter.sweep(Date.now()), SWEEP_INTERVAL_MS).unref();
  }

  return async (c: Context<AppEnv>, next: Next): Promise<Response | void> => {
    if (!config.enabled) {
      await next();
      return;
    }

    const client = clientKey(c, config.trustProxy);
    const decision = counter.hit(client, Date.now());

    if (!decision.allowed) {
      c.get("logger")?.warn({ client }, "rate limit exceeded");
      c.header("Retry-After", String(decision.retryAfterSeconds));
      return c.json(
        {
          error: "Too many requests",
          type: "rate_limit_exceeded",
          retryAfterSeconds: decision.retryAfterSeconds,
        },
        429,
      );
    }

    await next();
  };
}

function clientKey(c: Context<AppEnv>, trustProxy: boolean): string {
  if (!trustProxy) return "shared";

  const forwarded = c.req.header("x-forwarded-for")?.split(",")[0]?.trim();
  return forwarded || c.req.header("x-real-ip") || "shared";
}
