/**
 * @keel/lending — Lending pool interest accrual.
 *
 * Per-account principal with lazily accrued simple interest at a
 * single pool-wide annual rate.
 *
 * Design rules:
 * - Interest is floor-rounded and never compounds
 * - Accrual is lazy and shares one pool-wide instant
 * - Every mutation is atomic and non-reentrant
 * - All state is snapshot-able and restorable
 */

export { InterestAccrualLedger } from "./accrual-ledger.js";
export {
  SECONDS_PER_YEAR,
  MAX_RATE_BPS,
  assertRate,
  computeInterest,
  interestShare,
} from "./interest.js";

// Types
export { LendingError } from "./types.js";
export type {
  LendingPoolConfig,
  LendingPoolDeps,
  AccrualResult,
  PrincipalDepositReceipt,
  PrincipalWithdrawalReceipt,
  RateChange,
  Position,
  InterestAccrualSnapshot,
  LendingErrorCode,
} from "./types.js";
