// ---------------------------------------------------------------------------
// Hono environment shared by middleware and routes.
// ---------------------------------------------------------------------------

import type pino from "pino";

/** Per-request variables set by the middleware stack. */
export interface AppEnv {
  Variables: {
    requestId: string;
    /** Absent when a router is mounted without the request logger. */
    logger?: pino.Logger;
  };
}
