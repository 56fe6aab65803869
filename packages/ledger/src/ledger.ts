/**
 * @txledger/ledger — Transaction ledger.
 *
 * Fact store of every applied deposit and withdrawal, keyed by
 * transaction id. Disputes, resolves and chargebacks look up their
 * target here.
 *
 * API surface:
 * - record() — Store a new transaction with status "normal"
 * - get() / has() — Look up by transaction id
 * - mark() — Change the dispute status of a stored transaction
 *
 * There is NO delete(). Entries live for the whole run.
 * Transition rules belong to the caller; the ledger only checks identity.
 */

import type { ClientId, DisputeStatus, FundsKind, TxId } from "@txledger/types";
import type { LedgerTransaction } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Append-mostly map of transaction id to transaction.
 * The dispute status is the only field that changes after insertion.
 */
export class TransactionLedger {
  private readonly _transactions: Map<TxId, LedgerTransaction> = new Map();

  /**
   * Store a new transaction.
   * Throws if the transaction id was already recorded.
   */
  record(tx: TxId, client: ClientId, kind: FundsKind, amount: bigint): LedgerTransaction {
    if (this._transactions.has(tx)) {
      throw new LedgerError(
        "DUPLICATE_TRANSACTION",
        `Transaction already recorded: ${String(tx)}`,
      );
    }

    const entry: LedgerTransaction = {
      tx,
      client,
      kind,
      amount,
      status: "normal",
    };

    this._transactions.set(tx, entry);
    return entry;
  }

  get(tx: TxId): LedgerTransaction | undefined {
    return this._transactions.get(tx);
  }

  has(tx: TxId): boolean {
    return this._transactions.has(tx);
  }

  /**
   * Replace the dispute status of a stored transaction.
   * Throws if the transaction id is unknown.
   */
  mark(tx: TxId, status: DisputeStatus): LedgerTransaction {
    const existing = this._transactions.get(tx);
    if (existing === undefined) {
      throw new LedgerError(
        "UNKNOWN_TRANSACTION",
        `Unknown transaction: ${String(tx)}`,
      );
    }

    const updated: LedgerTransaction = { ...existing, status };
    this._transactions.set(tx, updated);
    return updated;
  }

  /**
   * Number of stored transactions.
   */
  get size(): number {
    return this._transactions.size;
  }
}
