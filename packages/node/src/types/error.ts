/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

import type { LedgerErrorCode } from "@coffer/ledger";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes the API returns: every ledger code plus the transport's own.
 */
export type ApiErrorCode =
  | LedgerErrorCode
  | "VALIDATION_ERROR"
  | "ROUTE_NOT_FOUND"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Request Validation
// =============================================================================

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Thrown when a request body or query fails its schema.
 * The error handler turns it into a 400 VALIDATION_ERROR.
 */
export class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[] = [],
  ) {
    super(message);
    this.name = "RequestValidationError";
  }
}
