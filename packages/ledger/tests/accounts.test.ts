/**
 * Tests for the account store.
 *
 * Covers:
 * - Lazy creation
 * - Delta application and the total invariant
 * - Negative held rejection
 * - Locking
 * - Deterministic snapshots
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AccountStore } from "../src/accounts.js";
import { LedgerError } from "../src/types.js";

describe("AccountStore", () => {
  let store: AccountStore;

  beforeEach(() => {
    store = new AccountStore();
  });

  describe("get / getOrCreate", () => {
    it("get does not create an account", () => {
      expect(store.get(1)).toBeUndefined();
      expect(store.has(1)).toBe(false);
      expect(store.size).toBe(0);
    });

    it("getOrCreate creates an empty unlocked account", () => {
      expect(store.getOrCreate(1)).toEqual({
        client: 1,
        available: 0n,
        held: 0n,
        total: 0n,
        locked: false,
      });
      expect(store.size).toBe(1);
    });

    it("getOrCreate returns the existing account", () => {
      store.applyDelta(1, 50_000n, 0n);
      expect(store.getOrCreate(1).available).toBe(50_000n);
      expect(store.size).toBe(1);
    });
  });

  describe("applyDelta", () => {
    it("creates the account on first use", () => {
      const account = store.applyDelta(4, 100_000n, 0n);
      expect(account.total).toBe(100_000n);
      expect(store.has(4)).toBe(true);
    });

    it("recomputes total from available and held", () => {
      store.applyDelta(1, 100_000n, 0n);
      const account = store.applyDelta(1, -30_000n, 30_000n);
      expect(account.available).toBe(70_000n);
      expect(account.held).toBe(30_000n);
      expect(account.total).toBe(100_000n);
    });

    it("allows available to go negative", () => {
      const account = store.applyDelta(1, -10_000n, 10_000n);
      expect(account.available).toBe(-10_000n);
      expect(account.total).toBe(0n);
    });

    it("rejects a held balance below zero and leaves the account untouched", () => {
      store.applyDelta(1, 20_000n, 10_000n);
      expect(() => store.applyDelta(1, 0n, -10_001n)).toThrow(LedgerError);
      expect(() => store.applyDelta(1, 0n, -10_001n)).toThrow(/would become -0.0001/);
      expect(store.get(1)).toEqual({
        client: 1,
        available: 20_000n,
        held: 10_000n,
        total: 30_000n,
        locked: false,
      });
    });

    it("keeps the locked flag", () => {
      store.lock(2);
      expect(store.applyDelta(2, 1n, 0n).locked).toBe(true);
    });
  });

  describe("lock", () => {
    it("locks an existing account and keeps balances", () => {
      store.applyDelta(1, 80_000n, 0n);
      const account = store.lock(1);
      expect(account.locked).toBe(true);
      expect(account.available).toBe(80_000n);
    });

    it("is idempotent", () => {
      store.lock(1);
      expect(store.lock(1).locked).toBe(true);
    });
  });

  describe("snapshotAll", () => {
    it("yields nothing for an empty store", () => {
      expect([...store.snapshotAll()]).toEqual([]);
    });

    it("renders balances with four decimal places", () => {
      store.applyDelta(1, -80_000n, 100_000n);
      expect([...store.snapshotAll()]).toEqual([
        {
          client: 1,
          available: "-8.0000",
          held: "10.0000",
          total: "2.0000",
          locked: false,
        },
      ]);
    });

    it("orders rows by client id regardless of insertion order", () => {
      store.applyDelta(30, 1n, 0n);
      store.applyDelta(2, 1n, 0n);
      store.applyDelta(100, 1n, 0n);
      expect([...store.snapshotAll()].map((row) => row.client)).toEqual([2, 30, 100]);
    });

    it("gives each call an independent pass", () => {
      store.applyDelta(1, 1n, 0n);
      store.applyDelta(2, 1n, 0n);
      const first = store.snapshotAll();
      expect(first.next()).toMatchObject({ done: false, value: { client: 1 } });
      expect([...store.snapshotAll()]).toHaveLength(2);
      expect(first.next()).toMatchObject({ done: false, value: { client: 2 } });
      expect(first.next().done).toBe(true);
    });

    it("is lazy", () => {
      const rows = store.snapshotAll();
      store.applyDelta(5, 10_000n, 0n);
      expect([...rows]).toEqual([
        { client: 5, available: "1.0000", held: "0.0000", total: "1.0000", locked: false },
      ]);
    });
  });
});
