/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response. Ledger errors map to
 * fixed statuses; anything unrecognized is a 500 and gets logged.
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Logger } from "pino";
import { LedgerError } from "@coffer/ledger";
import type { LedgerErrorCode } from "@coffer/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { RequestValidationError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Ledger Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP = {
  NOT_FOUND: 404,
  UNAUTHORIZED: 403,
  INVALID_AMOUNT: 422,
  INVALID_STATE: 409,
  ALREADY_VOIDED: 409,
  IMMUTABLE: 409,
  SAME_WALLET: 422,
  SAME_FLOW: 422,
  CURRENCY_MISMATCH: 422,
  STORE_FAILURE: 503,
  INVALID_INPUT: 400,
  ALREADY_EXISTS: 409,
} as const satisfies Record<LedgerErrorCode, number>;

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the handler registered with `app.onError`.
 */
export function createErrorHandler(logger: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof LedgerError) {
      const details = Object.keys(err.context).length > 0 ? { ...err.context } : undefined;
      if (err.code === "STORE_FAILURE") {
        logger.error({ err, requestId: c.get("requestId") }, "store failure");
      }
      return c.json(createErrorEnvelope(err.code, err.message, details), STATUS_MAP[err.code]);
    }

    if (err instanceof RequestValidationError) {
      const details = err.issues.length > 0 ? { issues: err.issues } : undefined;
      return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message, details), 400);
    }

    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    // Don't leak internal details
    logger.error({ err, requestId: c.get("requestId") }, "unhandled error");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
