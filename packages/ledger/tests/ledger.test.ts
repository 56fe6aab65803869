/**
 * Tests for the TransactionLedger fact store.
 *
 * Covers:
 * - Recording and lookup
 * - Duplicate id rejection
 * - Status transitions via mark()
 * - Immutability of returned entries
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TransactionLedger } from "../src/ledger.js";
import { LedgerError } from "../src/types.js";

describe("TransactionLedger", () => {
  let ledger: TransactionLedger;

  beforeEach(() => {
    ledger = new TransactionLedger();
  });

  // ─── record ──────────────────────────────────────────────────────────

  describe("record", () => {
    it("stores a transaction with status normal", () => {
      const entry = ledger.record(1, 7, "deposit", 100_000n);
      expect(entry).toEqual({
        tx: 1,
        client: 7,
        kind: "deposit",
        amount: 100_000n,
        status: "normal",
      });
      expect(ledger.size).toBe(1);
    });

    it("stores withdrawals too", () => {
      ledger.record(2, 7, "withdrawal", 30_000n);
      expect(ledger.get(2)?.kind).toBe("withdrawal");
    });

    it("rejects a duplicate transaction id", () => {
      ledger.record(1, 7, "deposit", 100_000n);
      expect(() => ledger.record(1, 8, "deposit", 5n)).toThrow(LedgerError);
      expect(() => ledger.record(1, 8, "deposit", 5n)).toThrow(/already recorded/);
    });

    it("keeps the original entry when a duplicate is rejected", () => {
      ledger.record(1, 7, "deposit", 100_000n);
      expect(() => ledger.record(1, 8, "withdrawal", 5n)).toThrow(LedgerError);
      expect(ledger.get(1)?.client).toBe(7);
      expect(ledger.get(1)?.amount).toBe(100_000n);
      expect(ledger.size).toBe(1);
    });
  });

  // ─── get / has ───────────────────────────────────────────────────────

  describe("get / has", () => {
    it("returns undefined for an unknown id", () => {
      expect(ledger.get(99)).toBeUndefined();
      expect(ledger.has(99)).toBe(false);
    });

    it("finds a recorded id", () => {
      ledger.record(3, 1, "deposit", 1n);
      expect(ledger.has(3)).toBe(true);
    });
  });

  // ─── mark ────────────────────────────────────────────────────────────

  describe("mark", () => {
    it("changes only the status", () => {
      ledger.record(1, 7, "deposit", 100_000n);
      const updated = ledger.mark(1, "disputed");
      expect(updated.status).toBe("disputed");
      expect(updated.amount).toBe(100_000n);
      expect(ledger.get(1)?.status).toBe("disputed");
    });

    it("does not mutate entries handed out earlier", () => {
      const original = ledger.record(1, 7, "deposit", 100_000n);
      ledger.mark(1, "disputed");
      expect(original.status).toBe("normal");
    });

    it("throws for an unknown id", () => {
      expect(() => ledger.mark(42, "disputed")).toThrow(LedgerError);
      expect(() => ledger.mark(42, "disputed")).toThrow(/Unknown transaction: 42/);
    });

    it("performs no transition checks of its own", () => {
      ledger.record(1, 7, "withdrawal", 1n);
      expect(ledger.mark(1, "charged_back").status).toBe("charged_back");
    });
  });
});
