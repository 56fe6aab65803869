/**
 * Transaction Record Types
 *
 * The shape of a single input record after it has been read and validated
 * at the boundary. Records are plain readonly data; meaning lives in the
 * processor that applies them.
 *
 * Rules:
 * - Amounts are decimal strings, never numbers
 * - Only deposits and withdrawals carry an amount
 * - Client and transaction ids are unsigned integers
 */

/** Client identifier (u16). */
export type ClientId = number;

/** Globally unique transaction identifier (u32). */
export type TxId = number;

/** Largest valid client id. */
export const MAX_CLIENT_ID = 0xffff;

/** Largest valid transaction id. */
export const MAX_TX_ID = 0xffffffff;

/** Every record kind, in the order they are documented. */
export const TRANSACTION_KINDS = [
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
] as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

/** Kinds that move funds and create a ledger entry. */
export type FundsKind = "deposit" | "withdrawal";

/** Kinds that refer back to an earlier deposit. */
export type ClaimKind = Exclude<TransactionKind, FundsKind>;

/**
 * A deposit or withdrawal.
 */
export interface FundsRecord {
  readonly kind: FundsKind;
  readonly client: ClientId;
  readonly tx: TxId;

  /** Non-negative decimal string (e.g., "10.5", "0.0001") */
  readonly amount: string;
}

/**
 * A dispute, resolve or chargeback against an earlier transaction.
 * The `tx` field names the referenced transaction, not a new one.
 */
export interface ClaimRecord {
  readonly kind: ClaimKind;
  readonly client: ClientId;
  readonly tx: TxId;
}

export type TransactionRecord = FundsRecord | ClaimRecord;

/**
 * Dispute lifecycle of a stored transaction.
 *
 * normal → disputed → resolved | charged_back
 */
export type DisputeStatus = "normal" | "disputed" | "resolved" | "charged_back";
