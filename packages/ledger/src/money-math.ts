/**
 * @keel/ledger — Deterministic fixed-point arithmetic.
 *
 * All arithmetic uses bigint base units. Rates are integer basis
 * points. Every division is explicit about its rounding direction.
 *
 * Rules:
 * - No floating-point operations
 * - Division by zero throws, never yields Infinity or zero
 * - Amounts are non-negative integers
 */

import type { Bps, Money, Currency } from "@keel/types";
import { LedgerError } from "./types.js";

/** 10000 bps = 100%. */
export const BPS_DENOMINATOR = 10_000n;

export type RoundingMode = "down" | "up";

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Assert an amount is a non-negative bigint.
 */
export function assertAmount(amount: bigint, field = "amount"): void {
  if (typeof amount !== "bigint" || amount < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `${field} must be a non-negative integer, got: ${String(amount)}`);
  }
}

/**
 * Assert a basis-point rate is an integer in [0, ceiling].
 */
export function assertBps(bps: Bps, ceiling: Bps = 10_000, field = "bps"): void {
  if (!Number.isInteger(bps) || bps < 0 || bps > ceiling) {
    throw new LedgerError("INVALID_BPS", `${field} must be an integer in [0, ${String(ceiling)}], got: ${String(bps)}`);
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Compute a * b / denom with the requested rounding.
 *
 * mulDiv(10n, 3n, 4n)        → 7n
 * mulDiv(10n, 3n, 4n, "up")  → 8n
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  denom: bigint,
  rounding: RoundingMode = "down",
): bigint {
  if (denom === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "Division by zero");
  }
  const product = a * b;
  const quotient = product / denom;
  if (rounding === "down") return quotient;
  return product % denom === 0n ? quotient : quotient + 1n;
}

/**
 * The basis-point share of an amount, rounded down.
 *
 * bpsOf(1000n, 50) → 5n
 */
export function bpsOf(amount: bigint, bps: Bps): bigint {
  assertBps(bps);
  return mulDiv(amount, BigInt(bps), BPS_DENOMINATOR);
}

/**
 * Sum a list of amounts, rejecting negatives.
 */
export function sumAmounts(amounts: readonly bigint[], field = "amount"): bigint {
  let total = 0n;
  for (const amount of amounts) {
    assertAmount(amount, field);
    total += amount;
  }
  return total;
}

// ─── Boundary conversion ─────────────────────────────────────────────────

/**
 * Parse a base-unit integer string ("1000000") into a bigint.
 */
export function parseAmount(amount: string): bigint {
  if (typeof amount !== "string" || !/^\d+$/.test(amount.trim())) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }
  return BigInt(amount.trim());
}

/**
 * Convert base units to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 5n with decimals=6     → "0.000005"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Wrap base units as a display Money value.
 */
export function toMoney(scaled: bigint, currency: Currency, decimals: number): Money {
  return {
    amount: formatAmount(scaled, decimals),
    currency,
    decimals,
  };
}
