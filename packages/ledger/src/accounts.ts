/**
 * @txledger/ledger — Account store.
 *
 * Holds the balance state of every client seen so far.
 *
 * Rules:
 * - Accounts are created lazily with zero balances
 * - total = available + held after every change
 * - held never goes below zero
 * - locked only ever goes from false to true
 * - Accounts are never removed
 */

import type { AccountSnapshot, ClientId } from "@txledger/types";
import type { AccountBalance } from "./types.js";
import { LedgerError } from "./types.js";
import { formatAmount } from "./money-math.js";

function emptyAccount(client: ClientId): AccountBalance {
  return {
    client,
    available: 0n,
    held: 0n,
    total: 0n,
    locked: false,
  };
}

function toSnapshot(account: AccountBalance): AccountSnapshot {
  return {
    client: account.client,
    available: formatAmount(account.available),
    held: formatAmount(account.held),
    total: formatAmount(account.total),
    locked: account.locked,
  };
}

/**
 * Map of client id to account balance.
 * Every change replaces the stored balance object.
 */
export class AccountStore {
  private readonly _accounts: Map<ClientId, AccountBalance> = new Map();

  /**
   * Get an account without creating it.
   */
  get(client: ClientId): AccountBalance | undefined {
    return this._accounts.get(client);
  }

  has(client: ClientId): boolean {
    return this._accounts.has(client);
  }

  /**
   * Get an account, creating an empty unlocked one if absent.
   */
  getOrCreate(client: ClientId): AccountBalance {
    let account = this._accounts.get(client);
    if (account === undefined) {
      account = emptyAccount(client);
      this._accounts.set(client, account);
    }
    return account;
  }

  /**
   * Adjust available and held by the given scaled deltas.
   * Throws (leaving the account untouched) if held would go negative.
   */
  applyDelta(client: ClientId, availableDelta: bigint, heldDelta: bigint): AccountBalance {
    const current = this._accounts.get(client) ?? emptyAccount(client);
    const available = current.available + availableDelta;
    const held = current.held + heldDelta;

    if (held < 0n) {
      throw new LedgerError(
        "NEGATIVE_HELD",
        `Held balance of client ${String(client)} would become ${formatAmount(held)}`,
      );
    }

    const updated: AccountBalance = {
      ...current,
      available,
      held,
      total: available + held,
    };

    this._accounts.set(client, updated);
    return updated;
  }

  /**
   * Freeze an account for the rest of the run.
   */
  lock(client: ClientId): AccountBalance {
    const updated: AccountBalance = { ...this.getOrCreate(client), locked: true };
    this._accounts.set(client, updated);
    return updated;
  }

  /**
   * Yield every account, rendered, in ascending client id order.
   * Each call starts an independent pass.
   */
  *snapshotAll(): Generator<AccountSnapshot, void, undefined> {
    const clients = [...this._accounts.keys()].sort((a, b) => a - b);

    for (const client of clients) {
      const account = this._accounts.get(client);
      if (account !== undefined) {
        yield toSnapshot(account);
      }
    }
  }

  /**
   * Number of known accounts.
   */
  get size(): number {
    return this._accounts.size;
  }
}
