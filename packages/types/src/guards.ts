/**
 * Runtime Type Guards
 *
 * Narrowing functions for record fields. Used at the input boundary
 * where cells arrive as untyped text.
 */

import type { ClientId, FundsKind, TransactionKind, TxId } from "./record.js";
import { MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_KINDS } from "./record.js";

const KINDS = new Set<string>(TRANSACTION_KINDS);

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && KINDS.has(value);
}

export function isFundsKind(kind: TransactionKind): kind is FundsKind {
  return kind === "deposit" || kind === "withdrawal";
}

export function isClientId(value: unknown): value is ClientId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CLIENT_ID
  );
}

export function isTxId(value: unknown): value is TxId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_TX_ID
  );
}
