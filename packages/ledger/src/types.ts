/**
 * @txledger/ledger — Internal types for the transaction engine.
 *
 * These extend the shared @txledger/types with engine-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Stored entries are replaced, never mutated in place
 * - Fail-closed: invalid state changes throw, never silently succeed
 */

import type {
  ClientId,
  DisputeStatus,
  FundsKind,
  TransactionKind,
  TransactionRecord,
  TxId,
} from "@txledger/types";

// ─── Ledger Types ────────────────────────────────────────────────────────

/**
 * A deposit or withdrawal kept for later dispute lookups.
 * Only `status` ever changes after the entry is recorded.
 */
export interface LedgerTransaction {
  readonly tx: TxId;
  readonly client: ClientId;
  readonly kind: FundsKind;
  /** Scaled amount (decimal × 10^4). */
  readonly amount: bigint;
  readonly status: DisputeStatus;
}

// ─── Account Types ───────────────────────────────────────────────────────

/**
 * Balance state of one client, in scaled units.
 * `total` is always `available + held`.
 */
export interface AccountBalance {
  readonly client: ClientId;
  readonly available: bigint;
  readonly held: bigint;
  readonly total: bigint;
  readonly locked: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for structural faults inside the engine. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "DUPLICATE_TRANSACTION"
  | "UNKNOWN_TRANSACTION"
  | "NEGATIVE_HELD";

/**
 * Structured error from the ledger and account store.
 * Signals a broken precondition, not a rejected record.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/** Reasons a record can be rejected by the processor. */
export type TransactionErrorCode =
  | "ACCOUNT_LOCKED"
  | "DUPLICATE_TRANSACTION"
  | "INSUFFICIENT_FUNDS"
  | "UNKNOWN_TRANSACTION"
  | "CLIENT_MISMATCH"
  | "NOT_DISPUTABLE"
  | "ALREADY_DISPUTED"
  | "NOT_DISPUTED";

/**
 * A record that broke a business rule.
 * The record had no effect; processing continues with the next one.
 */
export class TransactionError extends Error {
  public readonly code: TransactionErrorCode;
  public readonly kind: TransactionKind;
  public readonly client: ClientId;
  public readonly tx: TxId;

  constructor(
    code: TransactionErrorCode,
    record: Pick<TransactionRecord, "kind" | "client" | "tx">,
    message: string,
  ) {
    super(message);
    this.name = "TransactionError";
    this.code = code;
    this.kind = record.kind;
    this.client = record.client;
    this.tx = record.tx;
  }
}

// ─── Processing Types ────────────────────────────────────────────────────

/** Callback receiving every rejected record. */
export type RejectionHandler = (error: TransactionError) => void;

export interface TransactionProcessorOptions {
  readonly onRejected?: RejectionHandler | undefined;
}

/**
 * Counters for one pass over a record stream.
 */
export interface ProcessingSummary {
  readonly processed: number;
  readonly applied: number;
  readonly rejected: number;
  readonly rejectedByCode: Readonly<Partial<Record<TransactionErrorCode, number>>>;
}
