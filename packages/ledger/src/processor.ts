/**
 * @txledger/ledger — Transaction processor.
 *
 * Applies one record at a time against the ledger and account store.
 *
 * Rules:
 * - Records for a locked account are rejected
 * - Deposits and withdrawals need a fresh transaction id
 * - Withdrawals never exceed available funds
 * - Only deposits can be disputed, and only once
 * - Resolve and chargeback only apply to a disputed transaction
 * - A rejected record changes nothing
 *
 * Every check runs before the first write, so a record either has its
 * whole effect or none.
 */

import type {
  ClaimRecord,
  FundsRecord,
  TransactionRecord,
} from "@txledger/types";
import type { AccountStore } from "./accounts.js";
import type { TransactionLedger } from "./ledger.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type {
  LedgerTransaction,
  ProcessingSummary,
  RejectionHandler,
  TransactionErrorCode,
  TransactionProcessorOptions,
} from "./types.js";
import { LedgerError, TransactionError } from "./types.js";

export class TransactionProcessor {
  private readonly _ledger: TransactionLedger;
  private readonly _accounts: AccountStore;
  private readonly _onRejected: RejectionHandler | undefined;

  constructor(
    ledger: TransactionLedger,
    accounts: AccountStore,
    options: TransactionProcessorOptions = {},
  ) {
    this._ledger = ledger;
    this._accounts = accounts;
    this._onRejected = options.onRejected;
  }

  // ─── Single Record ───────────────────────────────────────────────────

  /**
   * Apply one record.
   *
   * Throws TransactionError when the record breaks a business rule.
   * Any other error means an engine invariant is broken.
   */
  apply(record: TransactionRecord): void {
    const account = this._accounts.get(record.client);
    if (account?.locked === true) {
      throw new TransactionError(
        "ACCOUNT_LOCKED",
        record,
        `Account ${String(record.client)} is locked`,
      );
    }

    switch (record.kind) {
      case "deposit":
        this._deposit(record);
        return;
      case "withdrawal":
        this._withdraw(record);
        return;
      case "dispute":
        this._dispute(record);
        return;
      case "resolve":
        this._resolve(record);
        return;
      case "chargeback":
        this._chargeback(record);
        return;
    }
  }

  // ─── Stream ──────────────────────────────────────────────────────────

  /**
   * Apply every record in arrival order.
   *
   * Rejected records go to the `onRejected` handler and processing
   * moves on. Errors other than TransactionError abort the run.
   */
  async process(
    records: Iterable<TransactionRecord> | AsyncIterable<TransactionRecord>,
  ): Promise<ProcessingSummary> {
    let processed = 0;
    let applied = 0;
    const rejectedByCode: Partial<Record<TransactionErrorCode, number>> = {};

    for await (const record of records) {
      processed++;
      try {
        this.apply(record);
        applied++;
      } catch (err: unknown) {
        if (!(err instanceof TransactionError)) {
          throw err;
        }
        rejectedByCode[err.code] = (rejectedByCode[err.code] ?? 0) + 1;
        this._onRejected?.(err);
      }
    }

    return {
      processed,
      applied,
      rejected: processed - applied,
      rejectedByCode,
    };
  }

  // ─── Funds Movements ─────────────────────────────────────────────────

  private _deposit(record: FundsRecord): void {
    const amount = this._parseFunds(record);
    this._assertFreshTransaction(record);

    this._ledger.record(record.tx, record.client, "deposit", amount);
    this._accounts.applyDelta(record.client, amount, 0n);
  }

  private _withdraw(record: FundsRecord): void {
    const amount = this._parseFunds(record);
    this._assertFreshTransaction(record);

    const available = this._accounts.get(record.client)?.available ?? 0n;
    if (amount > available) {
      throw new TransactionError(
        "INSUFFICIENT_FUNDS",
        record,
        `Insufficient funds: available ${formatAmount(available)}, requested ${formatAmount(amount)}`,
      );
    }

    this._ledger.record(record.tx, record.client, "withdrawal", amount);
    this._accounts.applyDelta(record.client, -amount, 0n);
  }

  // ─── Claims ──────────────────────────────────────────────────────────

  private _dispute(record: ClaimRecord): void {
    const target = this._findTarget(record);

    if (target.kind !== "deposit") {
      throw new TransactionError(
        "NOT_DISPUTABLE",
        record,
        `Transaction ${String(record.tx)} is a ${target.kind}; only deposits can be disputed`,
      );
    }
    if (target.status !== "normal") {
      throw new TransactionError(
        "ALREADY_DISPUTED",
        record,
        `Transaction ${String(record.tx)} was already disputed (status: ${target.status})`,
      );
    }

    this._accounts.applyDelta(record.client, -target.amount, target.amount);
    this._ledger.mark(record.tx, "disputed");
  }

  private _resolve(record: ClaimRecord): void {
    const target = this._findDisputed(record);

    this._accounts.applyDelta(record.client, target.amount, -target.amount);
    this._ledger.mark(record.tx, "resolved");
  }

  private _chargeback(record: ClaimRecord): void {
    const target = this._findDisputed(record);

    this._accounts.applyDelta(record.client, 0n, -target.amount);
    this._ledger.mark(record.tx, "charged_back");
    this._accounts.lock(record.client);
  }

  // ─── Helpers ─────────────────────────────────────────────────────────

  private _parseFunds(record: FundsRecord): bigint {
    const amount = parseAmount(record.amount);
    if (amount < 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Amount of ${record.kind} ${String(record.tx)} must not be negative, got "${record.amount}"`,
      );
    }
    return amount;
  }

  private _assertFreshTransaction(record: FundsRecord): void {
    if (this._ledger.has(record.tx)) {
      throw new TransactionError(
        "DUPLICATE_TRANSACTION",
        record,
        `Transaction ${String(record.tx)} already exists`,
      );
    }
  }

  /**
   * Look up the transaction a claim refers to and check its owner.
   */
  private _findTarget(record: ClaimRecord): LedgerTransaction {
    const target = this._ledger.get(record.tx);

    if (target === undefined) {
      throw new TransactionError(
        "UNKNOWN_TRANSACTION",
        record,
        `Transaction ${String(record.tx)} not found`,
      );
    }
    if (target.client !== record.client) {
      throw new TransactionError(
        "CLIENT_MISMATCH",
        record,
        `Transaction ${String(record.tx)} belongs to client ${String(target.client)}`,
      );
    }

    return target;
  }

  private _findDisputed(record: ClaimRecord): LedgerTransaction {
    const target = this._findTarget(record);

    if (target.status !== "disputed") {
      throw new TransactionError(
        "NOT_DISPUTED",
        record,
        `Cannot ${record.kind} transaction ${String(record.tx)}: not disputed (status: ${target.status})`,
      );
    }

    return target;
  }
}
