/**
 * Vault Types
 *
 * Domain types for the ShareLedger: a single-asset vault that issues
 * proportional ownership shares, charges basis-point fees, and lets a
 * privileged agent route vault-held native value to external calls.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint internally, strings in snapshots
 * - Custodied assets are read from the transfer agent, never stored
 */

import type {
  AccountId,
  AmountString,
  Authorizer,
  Bps,
  CallExecutor,
  ExternalCall,
  TransferAgent,
} from "@keel/types";

// =============================================================================
// Fees
// =============================================================================

/**
 * Fee rates in basis points.
 */
export interface FeeSchedule {
  readonly depositFeeBps: Bps;
  readonly withdrawalFeeBps: Bps;
  readonly performanceFeeBps: Bps;
}

/** Fixed ceilings per fee kind. */
export const FEE_CEILINGS: Readonly<Record<keyof FeeSchedule, Bps>> = {
  depositFeeBps: 1_000,
  withdrawalFeeBps: 1_000,
  performanceFeeBps: 3_000,
} as const;

export const ZERO_FEES: FeeSchedule = {
  depositFeeBps: 0,
  withdrawalFeeBps: 0,
  performanceFeeBps: 0,
};

// =============================================================================
// Configuration
// =============================================================================

export interface ShareLedgerConfig {
  /** The vault's own identity: custodian of the asset and of native value */
  readonly vaultId: AccountId;
  readonly owner: AccountId;
  readonly fees?: Partial<FeeSchedule> | undefined;
  readonly feeRecipient?: AccountId | undefined;
  readonly minLiquidityReserve?: bigint | undefined;
}

export interface ShareLedgerDeps {
  /** Transfer agent for the underlying asset, bound to `vaultId` */
  readonly transfers: TransferAgent;
  readonly authorizer: Authorizer;
  /** Executor for routed calls. Routing is unavailable without one. */
  readonly executor?: CallExecutor | undefined;
}

// =============================================================================
// Receipts
// =============================================================================

/**
 * Result of a deposit. The fee contributes no shares.
 */
export interface DepositReceipt {
  readonly caller: AccountId;
  readonly receiver: AccountId;
  readonly assets: bigint;
  readonly fee: bigint;
  /** False when no fee recipient is set and the fee stayed in the vault */
  readonly feeTransferred: boolean;
  readonly netAssets: bigint;
  readonly shares: bigint;
}

/**
 * Result of a withdraw or redeem.
 */
export interface WithdrawReceipt {
  readonly caller: AccountId;
  readonly receiver: AccountId;
  readonly owner: AccountId;
  /** Gross assets taken out of the vault's custody */
  readonly assets: bigint;
  readonly fee: bigint;
  readonly feeTransferred: boolean;
  /** Assets delivered to the receiver */
  readonly netAssets: bigint;
  readonly shares: bigint;
}

/**
 * Pure fee-and-price quote, identical to what a mutation would apply.
 */
export interface Quote {
  readonly assets: bigint;
  readonly fee: bigint;
  readonly netAssets: bigint;
  readonly shares: bigint;
}

export interface PerformanceFeeReceipt {
  /** Custodied assets the fee was charged against */
  readonly base: bigint;
  readonly fee: bigint;
  readonly transferred: boolean;
}

// =============================================================================
// Routing
// =============================================================================

/**
 * A registered strategy: a named destination the agent may route to.
 */
export interface Strategy {
  readonly id: string;
  readonly destination: AccountId;
  readonly description?: string | undefined;
}

/**
 * A validated routing request, handed to the call executor.
 */
export interface RoutePlan {
  readonly calls: readonly ExternalCall[];
  readonly totalValue: bigint;
  readonly nativeBalance: bigint;
  /** Native balance left after the calls: always ≥ the reserve */
  readonly remaining: bigint;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface ShareLedgerSnapshot {
  readonly version: 1;
  readonly vaultId: AccountId;
  readonly owner: AccountId;
  readonly fees: FeeSchedule;
  readonly feeRecipient?: AccountId | undefined;
  readonly minLiquidityReserve: AmountString;
  readonly totalShares: AmountString;
  readonly holders: readonly { readonly holder: AccountId; readonly shares: AmountString }[];
  readonly allowances: readonly {
    readonly owner: AccountId;
    readonly spender: AccountId;
    readonly shares: AmountString;
  }[];
  readonly strategies: readonly Strategy[];
}

// =============================================================================
// Error
// =============================================================================

export type VaultErrorCode =
  | "ZERO_AMOUNT"
  | "ZERO_SHARES"
  | "ZERO_ASSETS"
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INSUFFICIENT_LIQUIDITY"
  | "INVALID_EXECUTE_PARAMS"
  | "FEE_TOO_HIGH"
  | "INVALID_FEE_RECIPIENT"
  | "UNAUTHORIZED_CALLER"
  | "INVALID_STRATEGY_ID"
  | "STRATEGY_EXISTS"
  | "ROUTING_UNAVAILABLE"
  | "INVALID_ACCOUNT"
  | "INVALID_SNAPSHOT";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}
