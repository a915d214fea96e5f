/**
 * Transaction routes.
 *
 * GET    /api/v1/transactions/:id          — Get a transaction
 * PATCH  /api/v1/transactions/:id          — Edit note / category
 * POST   /api/v1/transactions/:id/refund   — Refund part or all of it
 * POST   /api/v1/transactions/:id/void     — Void and reverse its legs
 * GET    /api/v1/transactions/:id/refunds  — Refunded amount and remainder
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RefundSchema, UpdateTransactionSchema } from "../types/dto.js";
import { readBody } from "../middleware/validate.js";
import { toAmount } from "./serialize.js";

export function createTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:id", async (c) => {
    const tx = await c.get("engine").getTransaction(c.get("auth").username, c.req.param("id"));
    return c.json({ data: tx });
  });

  routes.patch("/:id", async (c) => {
    const fields = await readBody(c, UpdateTransactionSchema);
    const tx = await c
      .get("engine")
      .updateTransaction(c.get("auth").username, c.req.param("id"), fields);
    return c.json({ data: tx });
  });

  routes.post("/:id/refund", async (c) => {
    const body = await readBody(c, RefundSchema);
    const tx = await c.get("engine").recordRefund(c.get("auth").username, {
      ...body,
      transactionId: c.req.param("id"),
      amount: toAmount(body.amount),
    });
    return c.json({ data: tx }, 201);
  });

  routes.post("/:id/void", async (c) => {
    const tx = await c.get("engine").voidTransaction(c.get("auth").username, c.req.param("id"));
    return c.json({ data: tx });
  });

  routes.get("/:id/refunds", async (c) => {
    const summary = await c
      .get("engine")
      .getRefundSummary(c.get("auth").username, c.req.param("id"));
    return c.json({ data: summary });
  });

  return routes;
}
