/**
 * Simple-interest arithmetic.
 *
 * interest = floor(principal * rateBps * elapsed / (SECONDS_PER_YEAR * 10000))
 *
 * One year is a fixed 365 days. Interest does not compound.
 */

import { BPS_DENOMINATOR, assertBps, mulDiv } from "@keel/ledger";
import type { Bps } from "@keel/types";
import { LendingError } from "./types.js";

export const SECONDS_PER_YEAR = 31_536_000;
export const MAX_RATE_BPS: Bps = 10_000;

const YEAR_BPS = BigInt(SECONDS_PER_YEAR) * BPS_DENOMINATOR;

/**
 * Assert an annual rate is an integer in [0, 10000].
 */
export function assertRate(bps: Bps): void {
  if (Number.isInteger(bps) && bps > MAX_RATE_BPS) {
    throw new LendingError(
      "RATE_TOO_HIGH",
      `Annual rate of ${String(bps)} bps exceeds ${String(MAX_RATE_BPS)}`,
    );
  }
  assertBps(bps, MAX_RATE_BPS, "annualRateBps");
}

/**
 * Interest earned by `principal` over `elapsed` seconds, rounded down.
 */
export function computeInterest(principal: bigint, rateBps: Bps, elapsed: number): bigint {
  if (elapsed <= 0 || principal === 0n || rateBps === 0) return 0n;
  return mulDiv(principal * BigInt(rateBps), BigInt(elapsed), YEAR_BPS);
}

/**
 * The part of `accrued` released when `amount` of `principal` leaves.
 */
export function interestShare(amount: bigint, accrued: bigint, principal: bigint): bigint {
  if (principal === 0n) return 0n;
  return mulDiv(amount, accrued, principal);
}
