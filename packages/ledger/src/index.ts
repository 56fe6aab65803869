/**
 * @txledger/ledger — Transaction ledger and account state machine.
 *
 * No third-party runtime dependencies.
 * Enforces the money-movement invariants:
 * - total = available + held on every account, at every step
 * - held never goes negative
 * - withdrawals never overdraw available funds
 * - a deposit is disputed at most once, then resolved or charged back
 * - a charged-back account is locked for the rest of the run
 * - a rejected record has no effect
 *
 * Design rules:
 * - All types are readonly
 * - All monetary arithmetic uses bigint (no floating point)
 * - Fail-closed: broken invariants throw, never silently succeed
 */

// Core stores
export { TransactionLedger } from "./ledger.js";
export { AccountStore } from "./accounts.js";

// Processing
export { TransactionProcessor } from "./processor.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  parseAmount,
  formatAmount,
  isNonNegativeAmount,
} from "./money-math.js";

// Types
export type {
  LedgerTransaction,
  AccountBalance,
  LedgerErrorCode,
  TransactionErrorCode,
  RejectionHandler,
  TransactionProcessorOptions,
  ProcessingSummary,
} from "./types.js";

export { LedgerError, TransactionError } from "./types.js";
