/**
 * @coffer/types — Shared domain types for the coffer ledger.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Money is integer minor units plus a currency code
 */

export type { Money, CurrencyCode, CurrencyInfo, Period } from "./money.js";

export type {
  MembershipRole,
  FlowMembershipRole,
  VaultMembership,
  FlowMembership,
  VaultRecord,
  WalletRecord,
  CashFlowRecord,
  SystemFlowKind,
  FlowCap,
  CategoryRecord,
  VaultState,
} from "./vault.js";

export type {
  TransactionKind,
  TransactionState,
  TransferKind,
  LegTarget,
  Leg,
  IncomeTransaction,
  ExpenseTransaction,
  RefundTransaction,
  WalletTransferTransaction,
  FlowTransferTransaction,
  TransactionRecord,
} from "./transaction.js";
export { TRANSACTION_KINDS } from "./transaction.js";

export {
  isMinorUnits,
  isCurrencyCode,
  isMoney,
  isMembershipRole,
  isFlowMembershipRole,
  isTransactionKind,
  isTransactionState,
  isLegTarget,
  isLeg,
  isTransactionRecord,
  isFlowCap,
  isCategoryRecord,
} from "./guards.js";
