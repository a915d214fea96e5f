/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (store hash chain verifies)
 */

import { Hono } from "hono";
import type { LedgerStore } from "@coffer/store";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(store: LedgerStore): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const integrity = await store.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      store: {
        status: integrity.valid ? "ok" : "down",
        lastVerifiedSequence: integrity.lastVerifiedSequence,
        errors: integrity.errors.length,
      },
      timestamp: new Date().toISOString(),
    };

    if (!integrity.valid) {
      c.get("logger").error({ errors: integrity.errors }, "store integrity check failed");
      return c.json(body, 503);
    }
    return c.json(body, 200);
  });

  return routes;
}
