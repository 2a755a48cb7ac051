/**
 * Lending Types
 *
 * Domain types for the InterestAccrualLedger: a pool that holds
 * per-account principal and accrues simple annual interest on it.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint internally, strings in snapshots
 * - Instants are whole Unix seconds
 */

import type {
  AccountId,
  AmountString,
  Authorizer,
  Bps,
  Clock,
  TransferAgent,
} from "@keel/types";

// =============================================================================
// Configuration
// =============================================================================

export interface LendingPoolConfig {
  /** The pool's own identity: custodian of principal and reserves */
  readonly poolId: AccountId;
  readonly annualRateBps?: Bps | undefined;
}

export interface LendingPoolDeps {
  /** Transfer agent for the pool asset, bound to `poolId` */
  readonly transfers: TransferAgent;
  readonly authorizer: Authorizer;
  readonly clock: Clock;
}

// =============================================================================
// Results
// =============================================================================

export interface AccrualResult {
  readonly account: AccountId;
  /** Interest added by this accrual; zero when no time had passed */
  readonly interestDelta: bigint;
  readonly accruedInterest: bigint;
  readonly elapsed: number;
  /** The ledger's accrual instant after the call */
  readonly at: number;
}

export interface PrincipalDepositReceipt {
  readonly account: AccountId;
  readonly amount: bigint;
  readonly principal: bigint;
  readonly accruedInterest: bigint;
}

export interface PrincipalWithdrawalReceipt {
  readonly account: AccountId;
  readonly amount: bigint;
  /** Share of accrued interest released alongside the principal */
  readonly interest: bigint;
  /** amount + interest, pushed to the account */
  readonly paid: bigint;
  /** Principal left after the withdrawal */
  readonly principal: bigint;
  /** Accrued interest left after the withdrawal */
  readonly accruedInterest: bigint;
}

export interface RateChange {
  readonly previousRateBps: Bps;
  readonly annualRateBps: Bps;
  /** The caller's accrual under the previous rate */
  readonly accrual: AccrualResult;
}

export interface Position {
  readonly account: AccountId;
  readonly principal: bigint;
  readonly accruedInterest: bigint;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface InterestAccrualSnapshot {
  readonly version: 1;
  readonly poolId: AccountId;
  readonly annualRateBps: Bps;
  readonly lastAccrualInstant: number;
  readonly totalPrincipal: AmountString;
  readonly positions: readonly {
    readonly account: AccountId;
    readonly principal: AmountString;
    readonly accruedInterest: AmountString;
  }[];
}

// =============================================================================
// Error
// =============================================================================

export type LendingErrorCode =
  | "ZERO_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "RATE_TOO_HIGH"
  | "UNAUTHORIZED_CALLER"
  | "INVALID_ACCOUNT"
  | "INVALID_SNAPSHOT";

export class LendingError extends Error {
  public readonly code: LendingErrorCode;
  constructor(code: LendingErrorCode, message: string) {
    super(message);
    this.name = "LendingError";
    this.code = code;
  }
}
