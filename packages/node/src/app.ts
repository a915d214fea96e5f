/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Kept apart from main.ts: tests create the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { LedgerEngine } from "@coffer/engine";
import type { LedgerStore } from "@coffer/store";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware, userHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vaults.js";
import { createTransactionRoutes } from "./routes/transactions.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly engine: LedgerEngine;
  /** The engine's store, used by the readiness check */
  readonly store: LedgerStore;
  /** Default: silent */
  readonly logger?: Logger | undefined;
  /** When provided, API keys are required; otherwise X-User names the caller. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly engine: LedgerEngine;
  readonly store: LedgerStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { engine, store } = options;
  const logger = options.logger ?? pino({ level: "silent" });
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(logger));
  app.notFound((c) =>
    c.json(
      createErrorEnvelope("ROUTE_NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
      404,
    ),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(store));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("engine", engine);
    await next();
  });

  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev)
    app.use("/api/*", userHeaderMiddleware());
  }

  app.route("/api/v1/vaults", createVaultRoutes());
  app.route("/api/v1/transactions", createTransactionRoutes());

  return { app, engine, store };
}
