/**
 * @coffer/ledger — Money, delta planning, balances and statistics.
 *
 * Pure functions only. The engine composes them around a store.
 */

// Types
export type {
  MovementSpec,
  TransactionFilter,
  HolderStatistics,
  VaultTotals,
  VaultStatistics,
  BalanceDrift,
  LedgerErrorCode,
  LedgerEntity,
  LedgerErrorContext,
} from "./types.js";
export { LedgerError } from "./types.js";

// Money math
export {
  parseMinor,
  formatMinor,
  toMoney,
  moneyValue,
  validateMoney,
  assertPositive,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  applyDelta,
  sumMoney,
  isPositive,
  zeroMoney,
  compareMoney,
} from "./money-math.js";

// Currencies
export {
  isSupportedCurrency,
  listCurrencies,
  getCurrency,
  parseMajor,
  formatMajor,
} from "./currency.js";

// Legs
export { planLegs, reverseLegs, touches, flowIdsOf, walletIdsOf } from "./legs.js";

// Balances
export type { AppliedLegs } from "./balance-calculator.js";
export { applyLegs, computeBalances, findBalanceDrift } from "./balance-calculator.js";

// Refunds
export { postedRefundsOf, refundedAmount, refundRemainder, assertRefundable } from "./refunds.js";

// Caps
export type { CapDirection } from "./caps.js";
export {
  incomeContribution,
  computeIncomeTotal,
  capExceeded,
  enforceFlowCaps,
} from "./caps.js";

// Queries
export {
  transactionSortKey,
  validateFilter,
  inWindow,
  filterTransactions,
} from "./query.js";

// Statistics
export { computeStatistics } from "./statistics.js";
