/**
 * Authentication middleware.
 *
 * Two modes:
 * 1. Secured: X-Api-Key header → looked up in the configured key registry
 * 2. Unsecured (no keys configured): X-User header names the caller
 *
 * On success, sets `c.set("auth", authContext)`. On failure, returns 401.
 * Authorization inside a vault is the engine's job, not this layer's.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const USER_HEADER = "X-User";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Build an AuthConfig from parsed key records.
 */
export function authConfigFromKeys(keys: readonly ApiKeyRecord[]): AuthConfig {
  return { apiKeys: new Map(keys.map((k) => [k.key, k])) };
}

/**
 * Secured mode: resolve X-Api-Key to a username.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { type: "api-key", username: record.username });
    return next();
  };
}

/**
 * Unsecured mode (tests, local development): trust X-User.
 */
export function userHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const username = c.req.header(USER_HEADER)?.trim();
    if (username === undefined || username === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${USER_HEADER} header required`),
        401,
      );
    }

    c.set("auth", { type: "header", username });
    return next();
  };
}
