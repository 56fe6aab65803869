/**
 * @txledger/ledger — Fixed-scale monetary arithmetic.
 *
 * Amounts travel as decimal strings and are held as bigint values
 * scaled by 10^AMOUNT_DECIMALS.
 *
 * Rules:
 * - No floating-point operations
 * - One scale for every amount and balance
 * - Inputs with more fractional digits than the scale are rejected
 */

import { LedgerError } from "./types.js";

/** Fractional digits kept for every amount and balance. */
export const AMOUNT_DECIMALS = 4;

const AMOUNT_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Parse a decimal string into a scaled bigint.
 *
 * "10" → 100000n
 * "2.5" → 25000n
 * "-8.0001" → -80001n
 */
export function parseAmount(amount: string): bigint {
  const trimmed = amount.trim();

  if (!AMOUNT_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > AMOUNT_DECIMALS) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, at most ${String(AMOUNT_DECIMALS)} allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(AMOUNT_DECIMALS, "0"));
  return negative ? -value : value;
}

/**
 * Render a scaled bigint with exactly AMOUNT_DECIMALS fractional digits.
 *
 * 120000n → "12.0000"
 * -80000n → "-8.0000"
 * 5n → "0.0005"
 */
export function formatAmount(scaled: bigint): string {
  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(AMOUNT_DECIMALS + 1, "0");
  const intPart = str.slice(0, str.length - AMOUNT_DECIMALS);
  const fracPart = str.slice(str.length - AMOUNT_DECIMALS);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Check whether a string is an amount the engine accepts on input:
 * non-negative, well-formed, within the scale.
 */
export function isNonNegativeAmount(amount: string): boolean {
  const trimmed = amount.trim();
  if (trimmed.startsWith("-") || !AMOUNT_PATTERN.test(trimmed)) {
    return false;
  }
  const fracPart = trimmed.split(".")[1] ?? "";
  return fracPart.length <= AMOUNT_DECIMALS;
}
