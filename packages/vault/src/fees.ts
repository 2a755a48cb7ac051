/**
 * Fee schedule validation and fee arithmetic.
 *
 * Every fee is floor(amount * bps / 10000). The performance fee is
 * charged against the whole custodied balance on each collection;
 * there is no high-water mark, so repeated collections tax the same
 * base again.
 */

import { assertBps, bpsOf } from "@keel/ledger";
import type { Bps } from "@keel/types";
import type { FeeSchedule } from "./types.js";
import { FEE_CEILINGS, VaultError, ZERO_FEES } from "./types.js";

export type FeeKind = keyof FeeSchedule;

/**
 * Assert a fee rate is an integer within its kind's ceiling.
 */
export function assertFee(kind: FeeKind, bps: Bps): void {
  const ceiling = FEE_CEILINGS[kind];
  if (Number.isInteger(bps) && bps > ceiling) {
    throw new VaultError(
      "FEE_TOO_HIGH",
      `${kind} of ${String(bps)} exceeds the ceiling of ${String(ceiling)} bps`,
    );
  }
  assertBps(bps, ceiling, kind);
}

/**
 * Build a complete, validated schedule from a partial one.
 */
export function resolveFees(partial?: Partial<FeeSchedule>): FeeSchedule {
  const fees: FeeSchedule = {
    depositFeeBps: partial?.depositFeeBps ?? ZERO_FEES.depositFeeBps,
    withdrawalFeeBps: partial?.withdrawalFeeBps ?? ZERO_FEES.withdrawalFeeBps,
    performanceFeeBps: partial?.performanceFeeBps ?? ZERO_FEES.performanceFeeBps,
  };
  assertFee("depositFeeBps", fees.depositFeeBps);
  assertFee("withdrawalFeeBps", fees.withdrawalFeeBps);
  assertFee("performanceFeeBps", fees.performanceFeeBps);
  return fees;
}

/**
 * The fee taken from a gross amount and what is left of it.
 */
export function splitFee(gross: bigint, bps: Bps): { fee: bigint; net: bigint } {
  const fee = bpsOf(gross, bps);
  return { fee, net: gross - fee };
}
