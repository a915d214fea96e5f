/**
 * @coffer/engine — The ledger engine.
 *
 * Orchestrates every command against a vault:
 *
 *   authorize → validate → plan legs (pure) → one atomic commit
 *
 * Rules:
 * - Validation fails before anything is written
 * - Mutations on one vault are serialized by a per-vault lock
 * - A version conflict from another writer re-plans from fresh state;
 *   any other store failure surfaces as STORE_FAILURE
 * - Posted transactions only ever change note, category and void state
 * - Flow caps are checked against the balances a movement leaves behind
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type {
  CashFlowRecord,
  CategoryRecord,
  Leg,
  Money,
  Period,
  TransactionRecord,
  VaultRecord,
  VaultState,
  WalletRecord,
} from "@coffer/types";
import type {
  BalanceDrift,
  MovementSpec,
  TransactionFilter,
  VaultStatistics,
} from "@coffer/ledger";
import {
  LedgerError,
  applyLegs,
  assertPositive,
  assertRefundable,
  computeStatistics,
  enforceFlowCaps,
  filterTransactions,
  findBalanceDrift,
  flowIdsOf,
  planLegs,
  postedRefundsOf,
  refundedAmount,
  reverseLegs,
  subtractMoney,
  toMoney,
  validateMoney,
  walletIdsOf,
} from "@coffer/ledger";
import type { AccessRequirement, Capability, FlowCapInput } from "@coffer/vault";
import {
  addCategoryAlias,
  addFlowMember,
  addMember,
  archiveFlow,
  archiveWallet,
  assertActive,
  canSeeFlow,
  createCategory,
  createFlow,
  createWallet,
  provisionVault,
  removeCategoryAlias,
  removeFlowMember,
  removeMember,
  renameFlow,
  renameWallet,
  requireAccess,
  requireFlow,
  requireWallet,
  resolveCategory,
  setFlowCap,
  updateCategory,
} from "@coffer/vault";
import type { LedgerStore, StoreChange, VaultSnapshot } from "@coffer/store";
import { StoreError } from "@coffer/store";
import { KeyedLock } from "./keyed-lock.js";
import { normalizeText, normalizeTimestamp, parseFieldPatch } from "./metadata.js";
import type { CategoryRef } from "./records.js";
import { buildTransaction, withMetadata } from "./records.js";
import type {
  CreateVaultInput,
  LedgerEngineOptions,
  RecordExpenseInput,
  RecordIncomeInput,
  RecordRefundInput,
  SetFlowMemberInput,
  SetMemberInput,
  TransactionFieldPatch,
  TransactionMetadataInput,
  TransferFlowInput,
  TransferWalletInput,
  UpdateCategoryInput,
  UpdateFlowInput,
  UpdateHolderInput,
  VaultDeletePolicy,
} from "./types.js";

// =============================================================================
// Internal types
// =============================================================================

/**
 * What a planning step produces: the changes to commit and the
 * value to hand back once they are durable.
 */
interface Plan<T> {
  readonly changes: readonly StoreChange[];
  readonly result: T;
}

/**
 * The category a transaction's text resolved to, and the registration
 * to commit with it when the text was new.
 */
interface CategoryChoice {
  readonly ref: CategoryRef | undefined;
  readonly changes: readonly StoreChange[];
}

/**
 * A vault as seen by one caller: flow-scoped members see only their flows
 * and no wallets.
 */
export interface VaultView extends VaultState {
  readonly capability: Capability;
}

/**
 * Refund bookkeeping for one transaction.
 */
export interface RefundSummary {
  readonly transactionId: string;
  readonly refunded: Money;
  readonly remainder: Money;
  readonly refunds: readonly string[];
}

// =============================================================================
// Engine
// =============================================================================

export class LedgerEngine {
  private readonly _store: LedgerStore;
  private readonly _logger: Logger;
  private readonly _now: () => Date;
  private readonly _generateId: () => string;
  private readonly _defaultCurrency: string;
  private readonly _deletePolicy: VaultDeletePolicy;
  private readonly _maxConflictRetries: number;
  private readonly _locks = new KeyedLock();

  constructor(options: LedgerEngineOptions) {
    this._store = options.store;
    this._logger = options.logger ?? pino({ level: "silent" });
    this._now = options.now ?? (() => new Date());
    this._generateId = options.generateId ?? randomUUID;
    this._defaultCurrency = options.defaultCurrency ?? "EUR";
    this._deletePolicy = options.vaultDeletePolicy ?? "reject";
    this._maxConflictRetries = options.maxConflictRetries ?? 3;
  }

  get deletePolicy(): VaultDeletePolicy {
    return this._deletePolicy;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Vaults
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Provision a vault owned by `actor` with a Cash wallet and the
   * Unallocated flow.
   */
  async createVault(actor: string, input: CreateVaultInput = {}): Promise<VaultState> {
    return this._locks.run(`owner:${actor}`, async () => {
      const owned = await this._storeCall(() => this._store.findVaultsByOwner(actor));
      const state = provisionVault(
        {
          owner: actor,
          name: input.name,
          currency: input.currency ?? this._defaultCurrency,
          now: this._timestamp(),
          generateId: this._generateId,
        },
        owned,
      );

      const committed = await this._storeCall(() => this._store.createVault(state));
      this._logger.info({ vaultId: state.vault.id, owner: actor }, "vault created");
      return { ...state, version: committed.version };
    });
  }

  async getVault(actor: string, vaultId: string): Promise<VaultView> {
    const snapshot = await this._load(vaultId);
    const capability = requireAccess(snapshot.vault, actor, { action: "read-vault" });
    return this._view(snapshot, capability);
  }

  /** Vaults where `actor` holds any membership. */
  async listVaults(actor: string): Promise<readonly VaultRecord[]> {
    return this._storeCall(() => this._store.findVaultsForUser(actor));
  }

  /**
   * Delete a vault. Owner only; subject to the configured policy.
   */
  async deleteVault(actor: string, vaultId: string): Promise<void> {
    await this._locks.run(vaultId, async () => {
      const snapshot = await this._load(vaultId);
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });

      if (this._deletePolicy === "reject" && snapshot.transactions.length > 0) {
        throw new LedgerError(
          "INVALID_STATE",
          `Vault ${vaultId} still has ${String(snapshot.transactions.length)} transactions`,
          { entity: "vault", id: vaultId },
        );
      }

      await this._storeCall(() => this._store.deleteVault(vaultId, snapshot.version));
      this._logger.info(
        { vaultId, policy: this._deletePolicy, transactions: snapshot.transactions.length },
        "vault deleted",
      );
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Wallets and cash flows
  // ───────────────────────────────────────────────────────────────────────

  async createWallet(actor: string, vaultId: string, name: string): Promise<WalletRecord> {
    return this._mutate(vaultId, "wallet.create", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      const wallet = createWallet(snapshot, { id: this._generateId(), name, now: this._timestamp() });
      return { changes: [{ type: "put-wallet", wallet }], result: wallet };
    });
  }

  async updateWallet(
    actor: string,
    vaultId: string,
    walletId: string,
    input: UpdateHolderInput,
  ): Promise<WalletRecord> {
    return this._mutate(vaultId, "wallet.update", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      let wallet = requireWallet(snapshot, walletId);
      if (input.name !== undefined) {
        wallet = renameWallet(snapshot, walletId, input.name);
      }
      if (input.archived === true && !wallet.archived) {
        wallet = { ...archiveWallet(snapshot, walletId), name: wallet.name };
      }
      return { changes: [{ type: "put-wallet", wallet }], result: wallet };
    });
  }

  async createFlow(
    actor: string,
    vaultId: string,
    name: string,
    cap?: FlowCapInput,
  ): Promise<CashFlowRecord> {
    return this._mutate(vaultId, "flow.create", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      const flow = createFlow(snapshot, {
        id: this._generateId(),
        name,
        now: this._timestamp(),
        cap,
      });
      return { changes: [{ type: "put-flow", flow }], result: flow };
    });
  }

  async getFlow(actor: string, vaultId: string, flowId: string): Promise<CashFlowRecord> {
    const snapshot = await this._load(vaultId);
    requireAccess(snapshot.vault, actor, { action: "read-flow", flowId });
    return requireFlow(snapshot, flowId);
  }

  async updateFlow(
    actor: string,
    vaultId: string,
    flowId: string,
    input: UpdateFlowInput,
  ): Promise<CashFlowRecord> {
    return this._mutate(vaultId, "flow.update", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      let flow = requireFlow(snapshot, flowId);
      if (input.name !== undefined) {
        flow = renameFlow(snapshot, flowId, input.name);
      }
      if (input.archived === true && !flow.archived) {
        flow = { ...archiveFlow(snapshot, flowId), name: flow.name };
      }
      if (input.cap !== undefined) {
        flow = setFlowCap(snapshot, flow, input.cap, snapshot.transactions);
      }
      return { changes: [{ type: "put-flow", flow }], result: flow };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Categories
  // ───────────────────────────────────────────────────────────────────────

  /** Categories of a vault, by name. Archived ones only on request. */
  async listCategories(
    actor: string,
    vaultId: string,
    includeArchived = false,
  ): Promise<readonly CategoryRecord[]> {
    const snapshot = await this._load(vaultId);
    requireAccess(snapshot.vault, actor, { action: "read-vault" });
    return snapshot.categories
      .filter((c) => includeArchived || !c.archived)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async createCategory(actor: string, vaultId: string, name: string): Promise<CategoryRecord> {
    return this._mutate(vaultId, "category.create", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "write-vault" });
      const category = createCategory(snapshot.categories, {
        id: this._generateId(),
        vaultId,
        name,
        now: this._timestamp(),
      });
      return { changes: [{ type: "put-category", category }], result: category };
    });
  }

  /**
   * Rename, archive or restore a category. A rename is carried to every
   * transaction filed under it.
   */
  async updateCategory(
    actor: string,
    vaultId: string,
    categoryId: string,
    input: UpdateCategoryInput,
  ): Promise<CategoryRecord> {
    return this._mutate(vaultId, "category.update", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      const category = updateCategory(snapshot.categories, categoryId, input);
      const relabeled = snapshot.transactions
        .filter((tx) => tx.categoryId === categoryId && tx.category !== category.name)
        .map((tx): StoreChange => ({
          type: "put-transaction",
          transaction: { ...tx, category: category.name },
        }));
      return {
        changes: [{ type: "put-category", category }, ...relabeled],
        result: category,
      };
    });
  }

  async addCategoryAlias(
    actor: string,
    vaultId: string,
    categoryId: string,
    alias: string,
  ): Promise<CategoryRecord> {
    return this._mutate(vaultId, "category.alias.add", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      const category = addCategoryAlias(snapshot.categories, categoryId, alias);
      return { changes: [{ type: "put-category", category }], result: category };
    });
  }

  async removeCategoryAlias(
    actor: string,
    vaultId: string,
    categoryId: string,
    alias: string,
  ): Promise<CategoryRecord> {
    return this._mutate(vaultId, "category.alias.remove", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      const category = removeCategoryAlias(snapshot.categories, categoryId, alias);
      return { changes: [{ type: "put-category", category }], result: category };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Membership
  // ───────────────────────────────────────────────────────────────────────

  async setMember(actor: string, input: SetMemberInput): Promise<VaultRecord> {
    return this._mutate(input.vaultId, "member.set", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      const vault = addMember(snapshot.vault, {
        username: input.username,
        role: input.role,
        now: this._timestamp(),
      });
      return { changes: [{ type: "put-vault", vault }], result: vault };
    });
  }

  /**
   * Revoke a vault membership. Transactions the member recorded stay as they are.
   */
  async removeMember(actor: string, vaultId: string, username: string): Promise<VaultRecord> {
    return this._mutate(vaultId, "member.remove", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      const vault = removeMember(snapshot.vault, username);
      return { changes: [{ type: "put-vault", vault }], result: vault };
    });
  }

  async setFlowMember(actor: string, input: SetFlowMemberInput): Promise<VaultRecord> {
    return this._mutate(input.vaultId, "flow-member.set", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      const vault = addFlowMember(snapshot, {
        flowId: input.flowId,
        username: input.username,
        role: input.role,
        now: this._timestamp(),
      });
      return { changes: [{ type: "put-vault", vault }], result: vault };
    });
  }

  async removeFlowMember(
    actor: string,
    vaultId: string,
    flowId: string,
    username: string,
  ): Promise<VaultRecord> {
    return this._mutate(vaultId, "flow-member.remove", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "manage-vault" });
      const vault = removeFlowMember(snapshot, flowId, username);
      return { changes: [{ type: "put-vault", vault }], result: vault };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Credit a wallet (and optionally a flow).
   */
  async recordIncome(actor: string, input: RecordIncomeInput): Promise<TransactionRecord> {
    return this._mutate(input.vaultId, "income", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "write-vault" });
      this._requireActiveWallet(snapshot, input.walletId);
      if (input.flowId !== undefined) this._requireActiveFlow(snapshot, input.flowId);

      return this._post(snapshot, actor, input, {
        kind: "income",
        walletId: input.walletId,
        flowId: input.flowId,
      });
    });
  }

  /**
   * Debit a wallet (and optionally a flow). Balances may go negative.
   */
  async recordExpense(actor: string, input: RecordExpenseInput): Promise<TransactionRecord> {
    return this._mutate(input.vaultId, "expense", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "write-vault" });
      this._requireActiveWallet(snapshot, input.walletId);
      if (input.flowId !== undefined) this._requireActiveFlow(snapshot, input.flowId);

      return this._post(snapshot, actor, input, {
        kind: "expense",
        walletId: input.walletId,
        flowId: input.flowId,
      });
    });
  }

  /**
   * Reverse part or all of a posted transaction on the holders it touched.
   */
  async recordRefund(actor: string, input: RecordRefundInput): Promise<TransactionRecord> {
    const vaultId = await this._vaultOfTransaction(input.transactionId);
    return this._mutate(vaultId, "refund", (snapshot) => {
      const original = this._requireTransaction(snapshot, input.transactionId);
      requireAccess(snapshot.vault, actor, this._writeRequirement(original.legs));

      const amount = this._checkAmount(snapshot, input.amount);
      assertRefundable(original, amount, snapshot.transactions);

      return this._post(snapshot, actor, input, { kind: "refund", original });
    });
  }

  async transferWallet(actor: string, input: TransferWalletInput): Promise<TransactionRecord> {
    return this._mutate(input.vaultId, "transfer_wallet", (snapshot) => {
      requireAccess(snapshot.vault, actor, { action: "write-vault" });
      this._requireActiveWallet(snapshot, input.fromWalletId);
      this._requireActiveWallet(snapshot, input.toWalletId);

      return this._post(snapshot, actor, input, {
        kind: "transfer_wallet",
        fromWalletId: input.fromWalletId,
        toWalletId: input.toWalletId,
      });
    });
  }

  /**
   * Move budget between two flows. Flow-scoped editors may do this
   * between flows they edit.
   */
  async transferFlow(actor: string, input: TransferFlowInput): Promise<TransactionRecord> {
    return this._mutate(input.vaultId, "transfer_flow", (snapshot) => {
      requireAccess(snapshot.vault, actor, {
        action: "write-flows",
        flowIds: [input.fromFlowId, input.toFlowId],
      });
      this._requireActiveFlow(snapshot, input.fromFlowId);
      this._requireActiveFlow(snapshot, input.toFlowId);

      return this._post(snapshot, actor, input, {
        kind: "transfer_flow",
        fromFlowId: input.fromFlowId,
        toFlowId: input.toFlowId,
      });
    });
  }

  /**
   * Change note and/or category. Balances are not touched.
   */
  async updateTransaction(
    actor: string,
    transactionId: string,
    fields: TransactionFieldPatch,
  ): Promise<TransactionRecord> {
    const vaultId = await this._vaultOfTransaction(transactionId);
    return this._mutate(vaultId, "update", (snapshot) => {
      const record = this._requireTransaction(snapshot, transactionId);
      requireAccess(snapshot.vault, actor, this._writeRequirement(record.legs));

      const change = parseFieldPatch(fields, transactionId);
      if (record.state === "voided") {
        throw new LedgerError("INVALID_STATE", `Transaction ${transactionId} is voided`, {
          entity: "transaction",
          id: transactionId,
          field: "state",
        });
      }

      let category: CategoryRef | null | undefined;
      let registered: readonly StoreChange[] = [];
      if (typeof change.category === "string") {
        const choice = this._chooseCategory(snapshot, change.category);
        category = choice.ref ?? null;
        registered = choice.changes;
      } else {
        category = change.category;
      }

      const updated = withMetadata(record, { note: change.note, category });
      return {
        changes: [{ type: "put-transaction", transaction: updated }, ...registered],
        result: updated,
      };
    });
  }

  /**
   * Flip a posted transaction to voided and reverse its legs, once.
   */
  async voidTransaction(actor: string, transactionId: string): Promise<TransactionRecord> {
    const vaultId = await this._vaultOfTransaction(transactionId);
    return this._mutate(vaultId, "void", (snapshot) => {
      const record = this._requireTransaction(snapshot, transactionId);
      requireAccess(snapshot.vault, actor, this._writeRequirement(record.legs));

      if (record.state === "voided") {
        throw new LedgerError("ALREADY_VOIDED", `Transaction ${transactionId} is already voided`, {
          entity: "transaction",
          id: transactionId,
          field: "state",
        });
      }

      const refunds = postedRefundsOf(record.id, snapshot.transactions);
      if (refunds.length > 0) {
        throw new LedgerError(
          "INVALID_STATE",
          `Transaction ${transactionId} has ${String(refunds.length)} posted refunds; void them first`,
          { entity: "transaction", id: transactionId },
        );
      }

      const applied = applyLegs(snapshot, reverseLegs(record.legs));
      const flows = enforceFlowCaps(applied.flows, record.legs, "void");
      const voided: TransactionRecord = {
        ...record,
        state: "voided",
        voidedAt: this._timestamp(),
        voidedBy: actor,
      };

      return {
        changes: [
          { type: "put-transaction", transaction: voided },
          ...applied.wallets.map((wallet): StoreChange => ({ type: "put-wallet", wallet })),
          ...flows.map((flow): StoreChange => ({ type: "put-flow", flow })),
        ],
        result: voided,
      };
    });
  }

  async getTransaction(actor: string, transactionId: string): Promise<TransactionRecord> {
    const vaultId = await this._vaultOfTransaction(transactionId);
    const snapshot = await this._load(vaultId);
    const capability = requireAccess(snapshot.vault, actor, { action: "read-vault" });
    const record = this._requireTransaction(snapshot, transactionId);

    if (!this._canSeeTransaction(capability, record)) {
      throw new LedgerError("UNAUTHORIZED", `${actor} cannot see transaction ${transactionId}`, {
        entity: "transaction",
        id: transactionId,
      });
    }
    return record;
  }

  /**
   * Transactions of a vault, newest first.
   */
  async listTransactions(
    actor: string,
    vaultId: string,
    filter: TransactionFilter = {},
  ): Promise<readonly TransactionRecord[]> {
    const snapshot = await this._load(vaultId);
    const capability = requireAccess(
      snapshot.vault,
      actor,
      filter.flowId !== undefined ? { action: "read-flow", flowId: filter.flowId } : { action: "read-vault" },
    );

    return filterTransactions(
      snapshot.transactions.filter((tx) => this._canSeeTransaction(capability, tx)),
      filter,
    );
  }

  /**
   * How much of a transaction has been refunded, and by which refunds.
   */
  async getRefundSummary(actor: string, transactionId: string): Promise<RefundSummary> {
    const record = await this.getTransaction(actor, transactionId);
    const snapshot = await this._load(record.vaultId);
    const refunded = refundedAmount(record, snapshot.transactions);
    const refunds = postedRefundsOf(record.id, snapshot.transactions);

    return {
      transactionId,
      refunded,
      remainder: subtractMoney(record.amount, refunded),
      refunds: refunds.map((r) => r.id),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reporting
  // ───────────────────────────────────────────────────────────────────────

  async getStatistics(actor: string, vaultId: string, period: Period = {}): Promise<VaultStatistics> {
    const snapshot = await this._load(vaultId);
    const capability = requireAccess(snapshot.vault, actor, { action: "read-vault" });
    const view = this._view(snapshot, capability);

    return computeStatistics(
      view,
      snapshot.transactions.filter((tx) => this._canSeeTransaction(capability, tx)),
      period,
    );
  }

  /**
   * Compare stored balances with posted history. Owner only.
   * An empty result means the vault is consistent.
   */
  async auditVault(actor: string, vaultId: string): Promise<readonly BalanceDrift[]> {
    const snapshot = await this._load(vaultId);
    requireAccess(snapshot.vault, actor, { action: "manage-vault" });
    const drift = findBalanceDrift(snapshot, snapshot.transactions);
    if (drift.length > 0) {
      this._logger.error({ vaultId, drift }, "balance drift detected");
    }
    return drift;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal: commit path
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `plan` against the latest snapshot under the vault lock and commit
   * its changes with the snapshot's version as the expected version.
   */
  private async _mutate<T>(
    vaultId: string,
    operation: string,
    plan: (snapshot: VaultSnapshot) => Plan<T>,
  ): Promise<T> {
    return this._locks.run(vaultId, async () => {
      for (let attempt = 0; ; attempt++) {
        const snapshot = await this._load(vaultId);
        const { changes, result } = plan(snapshot);

        try {
          const committed = await this._store.commit({
            vaultId,
            expectedVersion: snapshot.version,
            changes,
          });
          this._logger.debug(
            { vaultId, operation, version: committed.version, changes: changes.length },
            "commit",
          );
          return result;
        } catch (err) {
          if (
            err instanceof StoreError &&
            err.code === "CONCURRENCY_CONFLICT" &&
            attempt < this._maxConflictRetries
          ) {
            this._logger.warn({ vaultId, operation, attempt: attempt + 1 }, "version conflict, re-planning");
            continue;
          }
          throw this._storeFailure(err, vaultId, operation);
        }
      }
    });
  }

  /**
   * Validate the amount, plan legs and assemble the commit for a new transaction.
   */
  private _post(
    snapshot: VaultSnapshot,
    actor: string,
    input: TransactionMetadataInput & { readonly amount: Money },
    spec: MovementSpec,
  ): Plan<TransactionRecord> {
    const amount = this._checkAmount(snapshot, input.amount);
    const legs = planLegs(spec, amount);
    const applied = applyLegs(snapshot, legs);
    const flows = enforceFlowCaps(applied.flows, legs, "post");
    const now = this._now();
    const id = this._generateId();
    const category = this._chooseCategory(snapshot, normalizeText(input.category, "category"));

    const record = buildTransaction(spec, {
      id,
      vaultId: snapshot.vault.id,
      amount: toMoney(amount, snapshot.vault.currency),
      occurredAt: normalizeTimestamp(input.occurredAt, now),
      recordedAt: now.toISOString(),
      createdBy: actor,
      note: normalizeText(input.note, "note"),
      category: category.ref?.name,
      categoryId: category.ref?.id,
      legs,
    });

    return {
      changes: [
        ...category.changes,
        { type: "put-transaction", transaction: record },
        ...applied.wallets.map((wallet): StoreChange => ({ type: "put-wallet", wallet })),
        ...flows.map((flow): StoreChange => ({ type: "put-flow", flow })),
      ],
      result: record,
    };
  }

  /**
   * Resolve category text against the registry, registering it when new.
   */
  private _chooseCategory(snapshot: VaultSnapshot, text: string | undefined): CategoryChoice {
    const selection = resolveCategory(snapshot.categories, text, {
      generateId: this._generateId,
      vaultId: snapshot.vault.id,
      now: this._timestamp(),
    });
    switch (selection.kind) {
      case "none":
        return { ref: undefined, changes: [] };
      case "existing":
        return { ref: selection.category, changes: [] };
      case "created":
        return {
          ref: selection.category,
          changes: [{ type: "put-category", category: selection.category }],
        };
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal: validation helpers
  // ───────────────────────────────────────────────────────────────────────

  private _checkAmount(snapshot: VaultSnapshot, amount: Money): bigint {
    validateMoney(amount);
    if (amount.currency !== snapshot.vault.currency) {
      throw new LedgerError(
        "CURRENCY_MISMATCH",
        `Vault ${snapshot.vault.id} uses ${snapshot.vault.currency}, got ${amount.currency}`,
        { entity: "vault", id: snapshot.vault.id, field: "currency" },
      );
    }
    return assertPositive(amount);
  }

  private _requireActiveWallet(snapshot: VaultSnapshot, walletId: string): void {
    assertActive(requireWallet(snapshot, walletId), "wallet");
  }

  private _requireActiveFlow(snapshot: VaultSnapshot, flowId: string): void {
    assertActive(requireFlow(snapshot, flowId), "flow");
  }

  private _requireTransaction(snapshot: VaultSnapshot, transactionId: string): TransactionRecord {
    const record = snapshot.transactions.find((tx) => tx.id === transactionId);
    if (record === undefined) {
      throw new LedgerError("NOT_FOUND", `Transaction not found: ${transactionId}`, {
        entity: "transaction",
        id: transactionId,
      });
    }
    return record;
  }

  /**
   * Anything touching a wallet needs vault-level write; flow-only
   * movements can be handled by editors of every flow involved.
   */
  private _writeRequirement(legs: readonly Leg[]): AccessRequirement {
    return walletIdsOf(legs).length > 0
      ? { action: "write-vault" }
      : { action: "write-flows", flowIds: flowIdsOf(legs) };
  }

  private _canSeeTransaction(capability: Capability, record: TransactionRecord): boolean {
    if (capability.scope === "vault") return true;
    return flowIdsOf(record.legs).some((id) => canSeeFlow(capability, id));
  }

  private _view(snapshot: VaultSnapshot, capability: Capability): VaultView {
    const base: VaultState = {
      vault: snapshot.vault,
      wallets: capability.scope === "vault" ? snapshot.wallets : [],
      flows: snapshot.flows.filter((f) => canSeeFlow(capability, f.id)),
      version: snapshot.version,
    };
    return { ...base, capability };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal: store access
  // ───────────────────────────────────────────────────────────────────────

  private async _load(vaultId: string): Promise<VaultSnapshot> {
    const snapshot = await this._storeCall(() => this._store.loadVault(vaultId));
    if (snapshot === undefined) {
      throw new LedgerError("NOT_FOUND", `Vault not found: ${vaultId}`, {
        entity: "vault",
        id: vaultId,
      });
    }
    return snapshot;
  }

  private async _vaultOfTransaction(transactionId: string): Promise<string> {
    const record = await this._storeCall(() => this._store.findTransaction(transactionId));
    if (record === undefined) {
      throw new LedgerError("NOT_FOUND", `Transaction not found: ${transactionId}`, {
        entity: "transaction",
        id: transactionId,
      });
    }
    return record.vaultId;
  }

  /**
   * Run a store call, converting any store-side failure to STORE_FAILURE.
   */
  private async _storeCall<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw this._storeFailure(err, undefined, "read");
    }
  }

  private _storeFailure(err: unknown, vaultId: string | undefined, operation: string): LedgerError {
    if (err instanceof LedgerError) return err;
    this._logger.error({ err, vaultId, operation }, "store failure");
    const message = err instanceof Error ? err.message : String(err);
    return new LedgerError(
      "STORE_FAILURE",
      `Store failure during ${operation}: ${message}`,
      vaultId !== undefined ? { entity: "vault", id: vaultId } : {},
      { cause: err },
    );
  }

  private _timestamp(): string {
    return this._now().toISOString();
  }
}
