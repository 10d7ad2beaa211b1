// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import { randomUUID } from "node:crypto";
import type { Context, Next } from "hono";
import type { AppEnv } from "../env.js";

const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Returns a Hono middleware that generates a unique request ID for every
 * incoming request.
 *
 * The ID is generated via `randomUUID()` and is:
 *
 * 1. Stored on the Hono context as `"requestId"` for downstream handlers.
 * 2. Echoed back to the client in the `X-Request-ID` response header.
 *
 * If the incoming request already carries an `X-Request-ID` header, that
 * value is reused instead of generating a new one.
 */
export function requestIdMiddleware(): (
  c: Context<AppEnv>,
  next: Next,
) => Promise<void> {
  return async (c: Context<AppEnv>, next: Next): Promise<void> => {
    const existing = c.req.header("x-request-id");

    // Client-supplied IDs end up in every log line: UUID-ish tokens only.
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing)
        ? existing
        : randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
