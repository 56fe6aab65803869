/**
 * @txledger/types — Shared domain types for the txledger stack.
 *
 * These types are used across all txledger packages:
 * - Input records and their kinds
 * - Dispute lifecycle status
 * - Rendered account snapshots
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Record types
export type {
  ClientId,
  TxId,
  TransactionKind,
  FundsKind,
  ClaimKind,
  FundsRecord,
  ClaimRecord,
  TransactionRecord,
  DisputeStatus,
} from "./record.js";

export { MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_KINDS } from "./record.js";

// Account types
export type { AccountSnapshot } from "./account.js";

// Runtime type guards
export {
  isTransactionKind,
  isFundsKind,
  isClientId,
  isTxId,
} from "./guards.js";
