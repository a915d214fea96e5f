/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Logger } from "pino";
import type { LedgerEngine } from "@coffer/engine";
import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Request-scoped child logger carrying the request id */
    logger: Logger;

    /** The shared ledger engine */
    engine: LedgerEngine;

    /** Authenticated caller (set by auth middleware) */
    auth: AuthContext;
  };
}
