/**
 * @coffer/node — Entry point.
 *
 * Loads config, opens the store, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { LedgerEngine } from "@coffer/engine";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import { authConfigFromKeys } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { openStore } from "./store.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let auth: AuthConfig | undefined;
  const keys = parseApiKeys(config.API_KEYS);
  if (keys.length > 0) {
    auth = authConfigFromKeys(keys);
    logger.info({ apiKeyCount: keys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, trusting the X-User header");
  }

  const store = openStore(config, logger);
  const integrity = await store.verifyIntegrity();
  if (!integrity.valid) {
    logger.error({ errors: integrity.errors }, "store hash chain does not verify");
  }

  const engine = new LedgerEngine({
    store,
    logger: logger.child({ component: "engine" }),
    defaultCurrency: config.DEFAULT_CURRENCY,
    vaultDeletePolicy: config.VAULT_DELETE_POLICY,
    maxConflictRetries: config.CONFLICT_RETRIES,
  });

  const { app } = createApp({ engine, store, logger, auth });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Ledger node started");

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutdown signal received");

    const timer = setTimeout(() => {
      logger.error({ timeoutMs: config.SHUTDOWN_TIMEOUT_MS }, "Shutdown timed out");
      process.exit(1);
    }, config.SHUTDOWN_TIMEOUT_MS);
    timer.unref();

    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Error while closing server");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
