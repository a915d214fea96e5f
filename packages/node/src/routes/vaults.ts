/**
 * Vault routes.
 *
 * GET    /api/v1/vaults                                   — Vaults the caller belongs to
 * POST   /api/v1/vaults                                   — Create a vault
 * GET    /api/v1/vaults/:vaultId                          — Vault with wallets and flows
 * DELETE /api/v1/vaults/:vaultId                          — Delete a vault
 * POST   /api/v1/vaults/:vaultId/wallets                  — Create a wallet
 * PATCH  /api/v1/vaults/:vaultId/wallets/:walletId        — Rename / archive a wallet
 * POST   /api/v1/vaults/:vaultId/flows                    — Create a cash flow
 * GET    /api/v1/vaults/:vaultId/flows/:flowId            — Get a cash flow
 * PATCH  /api/v1/vaults/:vaultId/flows/:flowId            — Rename / archive / cap a cash flow
 * GET    /api/v1/vaults/:vaultId/categories               — Categories by name
 * POST   /api/v1/vaults/:vaultId/categories               — Register a category
 * PATCH  /api/v1/vaults/:vaultId/categories/:categoryId   — Rename / archive / restore
 * POST   /api/v1/vaults/:vaultId/categories/:categoryId/aliases
 * DELETE /api/v1/vaults/:vaultId/categories/:categoryId/aliases/:alias
 * PUT    /api/v1/vaults/:vaultId/members/:username        — Grant or change a vault role
 * DELETE /api/v1/vaults/:vaultId/members/:username        — Revoke a vault role
 * PUT    /api/v1/vaults/:vaultId/flows/:flowId/members/:username
 * DELETE /api/v1/vaults/:vaultId/flows/:flowId/members/:username
 * POST   /api/v1/vaults/:vaultId/transactions/income
 * POST   /api/v1/vaults/:vaultId/transactions/expense
 * POST   /api/v1/vaults/:vaultId/transactions/transfer-wallet
 * POST   /api/v1/vaults/:vaultId/transactions/transfer-flow
 * GET    /api/v1/vaults/:vaultId/transactions             — List (cursor pagination, newest first)
 * GET    /api/v1/vaults/:vaultId/statistics               — Period statistics
 * GET    /api/v1/vaults/:vaultId/audit                    — Balance drift (owner only)
 */

import { Hono } from "hono";
import { transactionSortKey } from "@coffer/ledger";
import type { AppEnv } from "../types/api-contract.js";
import {
  CategoryAliasSchema,
  CreateCategorySchema,
  CreateFlowSchema,
  CreateHolderSchema,
  CreateVaultSchema,
  ListCategoriesQuerySchema,
  ListTransactionsQuerySchema,
  PeriodQuerySchema,
  RecordMovementSchema,
  SetFlowMemberSchema,
  SetMemberSchema,
  TransferFlowSchema,
  TransferWalletSchema,
  UpdateCategorySchema,
  UpdateFlowSchema,
  UpdateHolderSchema,
} from "../types/dto.js";
import { readBody, readQuery } from "../middleware/validate.js";
import { paginate } from "../types/pagination.js";
import { serializeVaultView, toAmount, toFlowCap, toPeriod } from "./serialize.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Vaults ─────────────────────────────────────────────────────

  routes.get("/", async (c) => {
    const vaults = await c.get("engine").listVaults(c.get("auth").username);
    return c.json({ data: vaults });
  });

  routes.post("/", async (c) => {
    const body = await readBody(c, CreateVaultSchema);
    const state = await c.get("engine").createVault(c.get("auth").username, body);
    return c.json({ data: state }, 201);
  });

  routes.get("/:vaultId", async (c) => {
    const view = await c.get("engine").getVault(c.get("auth").username, c.req.param("vaultId"));
    return c.json({ data: serializeVaultView(view) });
  });

  routes.delete("/:vaultId", async (c) => {
    await c.get("engine").deleteVault(c.get("auth").username, c.req.param("vaultId"));
    return c.body(null, 204);
  });

  // ─── Wallets ────────────────────────────────────────────────────

  routes.post("/:vaultId/wallets", async (c) => {
    const body = await readBody(c, CreateHolderSchema);
    const wallet = await c
      .get("engine")
      .createWallet(c.get("auth").username, c.req.param("vaultId"), body.name);
    return c.json({ data: wallet }, 201);
  });

  routes.patch("/:vaultId/wallets/:walletId", async (c) => {
    const body = await readBody(c, UpdateHolderSchema);
    const wallet = await c
      .get("engine")
      .updateWallet(c.get("auth").username, c.req.param("vaultId"), c.req.param("walletId"), body);
    return c.json({ data: wallet });
  });

  // ─── Cash flows ─────────────────────────────────────────────────

  routes.post("/:vaultId/flows", async (c) => {
    const body = await readBody(c, CreateFlowSchema);
    const cap = body.cap === undefined ? undefined : toFlowCap(body.cap);
    const flow = await c
      .get("engine")
      .createFlow(c.get("auth").username, c.req.param("vaultId"), body.name, cap);
    return c.json({ data: flow }, 201);
  });

  routes.get("/:vaultId/flows/:flowId", async (c) => {
    const flow = await c
      .get("engine")
      .getFlow(c.get("auth").username, c.req.param("vaultId"), c.req.param("flowId"));
    return c.json({ data: flow });
  });

  routes.patch("/:vaultId/flows/:flowId", async (c) => {
    const { cap, ...body } = await readBody(c, UpdateFlowSchema);
    const flow = await c.get("engine").updateFlow(
      c.get("auth").username,
      c.req.param("vaultId"),
      c.req.param("flowId"),
      { ...body, cap: cap === undefined || cap === null ? cap : toFlowCap(cap) },
    );
    return c.json({ data: flow });
  });

  // ─── Categories ─────────────────────────────────────────────────

  routes.get("/:vaultId/categories", async (c) => {
    const query = readQuery(c, ListCategoriesQuerySchema);
    const categories = await c
      .get("engine")
      .listCategories(c.get("auth").username, c.req.param("vaultId"), query.includeArchived);
    return c.json({ data: categories });
  });

  routes.post("/:vaultId/categories", async (c) => {
    const body = await readBody(c, CreateCategorySchema);
    const category = await c
      .get("engine")
      .createCategory(c.get("auth").username, c.req.param("vaultId"), body.name);
    return c.json({ data: category }, 201);
  });

  routes.patch("/:vaultId/categories/:categoryId", async (c) => {
    const body = await readBody(c, UpdateCategorySchema);
    const category = await c
      .get("engine")
      .updateCategory(c.get("auth").username, c.req.param("vaultId"), c.req.param("categoryId"), body);
    return c.json({ data: category });
  });

  routes.post("/:vaultId/categories/:categoryId/aliases", async (c) => {
    const body = await readBody(c, CategoryAliasSchema);
    const category = await c
      .get("engine")
      .addCategoryAlias(
        c.get("auth").username,
        c.req.param("vaultId"),
        c.req.param("categoryId"),
        body.alias,
      );
    return c.json({ data: category }, 201);
  });

  routes.delete("/:vaultId/categories/:categoryId/aliases/:alias", async (c) => {
    const category = await c
      .get("engine")
      .removeCategoryAlias(
        c.get("auth").username,
        c.req.param("vaultId"),
        c.req.param("categoryId"),
        c.req.param("alias"),
      );
    return c.json({ data: category });
  });

  // ─── Membership ─────────────────────────────────────────────────

  routes.put("/:vaultId/members/:username", async (c) => {
    const body = await readBody(c, SetMemberSchema);
    const vault = await c.get("engine").setMember(c.get("auth").username, {
      vaultId: c.req.param("vaultId"),
      username: c.req.param("username"),
      role: body.role,
    });
    return c.json({ data: vault });
  });

  routes.delete("/:vaultId/members/:username", async (c) => {
    const vault = await c
      .get("engine")
      .removeMember(c.get("auth").username, c.req.param("vaultId"), c.req.param("username"));
    return c.json({ data: vault });
  });

  routes.put("/:vaultId/flows/:flowId/members/:username", async (c) => {
    const body = await readBody(c, SetFlowMemberSchema);
    const vault = await c.get("engine").setFlowMember(c.get("auth").username, {
      vaultId: c.req.param("vaultId"),
      flowId: c.req.param("flowId"),
      username: c.req.param("username"),
      role: body.role,
    });
    return c.json({ data: vault });
  });

  routes.delete("/:vaultId/flows/:flowId/members/:username", async (c) => {
    const vault = await c
      .get("engine")
      .removeFlowMember(
        c.get("auth").username,
        c.req.param("vaultId"),
        c.req.param("flowId"),
        c.req.param("username"),
      );
    return c.json({ data: vault });
  });

  // ─── Transactions ───────────────────────────────────────────────

  routes.post("/:vaultId/transactions/income", async (c) => {
    const body = await readBody(c, RecordMovementSchema);
    const tx = await c.get("engine").recordIncome(c.get("auth").username, {
      ...body,
      vaultId: c.req.param("vaultId"),
      amount: toAmount(body.amount),
    });
    return c.json({ data: tx }, 201);
  });

  routes.post("/:vaultId/transactions/expense", async (c) => {
    const body = await readBody(c, RecordMovementSchema);
    const tx = await c.get("engine").recordExpense(c.get("auth").username, {
      ...body,
      vaultId: c.req.param("vaultId"),
      amount: toAmount(body.amount),
    });
    return c.json({ data: tx }, 201);
  });

  routes.post("/:vaultId/transactions/transfer-wallet", async (c) => {
    const body = await readBody(c, TransferWalletSchema);
    const tx = await c.get("engine").transferWallet(c.get("auth").username, {
      ...body,
      vaultId: c.req.param("vaultId"),
      amount: toAmount(body.amount),
    });
    return c.json({ data: tx }, 201);
  });

  routes.post("/:vaultId/transactions/transfer-flow", async (c) => {
    const body = await readBody(c, TransferFlowSchema);
    const tx = await c.get("engine").transferFlow(c.get("auth").username, {
      ...body,
      vaultId: c.req.param("vaultId"),
      amount: toAmount(body.amount),
    });
    return c.json({ data: tx }, 201);
  });

  routes.get("/:vaultId/transactions", async (c) => {
    const { cursor, limit, ...filter } = readQuery(c, ListTransactionsQuerySchema);
    const transactions = await c
      .get("engine")
      .listTransactions(c.get("auth").username, c.req.param("vaultId"), filter);

    const result = paginate(transactions, { cursor, limit }, transactionSortKey, "occurredAt", "desc");
    return c.json(result);
  });

  // ─── Reports ────────────────────────────────────────────────────

  routes.get("/:vaultId/statistics", async (c) => {
    const query = readQuery(c, PeriodQuerySchema);
    const statistics = await c
      .get("engine")
      .getStatistics(c.get("auth").username, c.req.param("vaultId"), toPeriod(query));
    return c.json({ data: statistics });
  });

  routes.get("/:vaultId/audit", async (c) => {
    const vaultId = c.req.param("vaultId");
    const drift = await c.get("engine").auditVault(c.get("auth").username, vaultId);
    return c.json({ data: { vaultId, consistent: drift.length === 0, drift } });
  });

  return routes;
}
