/**
 * Financial Types
 *
 * Amounts inside the ledgers are bigint base units. At system
 * boundaries (HTTP, snapshots) they travel as strings.
 *
 * Rules:
 * - No floating-point amounts anywhere
 * - Currency is always explicit
 * - Basis points are integers in [0, 10000]
 */

/**
 * Supported currency identifiers (token symbols).
 */
export type Currency = string;

/**
 * A display amount. String representation to avoid IEEE 754 issues.
 */
export interface Money {
  /** Decimal string scaled by `decimals` (e.g. "100.500000") */
  readonly amount: string;

  /** Token symbol (e.g. "USDC") */
  readonly currency: Currency;

  /** Number of decimal places of the token's base unit */
  readonly decimals: number;
}

/** Basis points: 1/100th of a percent. 10000 bps = 100%. */
export type Bps = number;

/** Base-unit amount serialised as a non-negative decimal integer string. */
export type AmountString = string;
