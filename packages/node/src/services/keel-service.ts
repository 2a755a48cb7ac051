/**
 * KeelService — Composition root for the vault and the lending pool.
 *
 * Route handlers delegate to this service; they never touch the
 * ledgers' collaborators directly. The service owns:
 * - an in-memory book for the pool/vault asset
 * - an in-memory book for native value, behind the call executor
 * - one ShareLedger and one InterestAccrualLedger
 *
 * Every mutation is logged once: committed at info, rejected at warn
 * with the error code, then rethrown.
 */

import { InMemoryTokenBook, LedgerError, SystemClock, toMoney } from "@keel/ledger";
import { InterestAccrualLedger } from "@keel/lending";
import type {
  AccrualResult,
  InterestAccrualSnapshot,
  PrincipalDepositReceipt,
  PrincipalWithdrawalReceipt,
  RateChange,
} from "@keel/lending";
import type { AccountId, Authorizer, Bps, Clock, Money } from "@keel/types";
import { ShareLedger } from "@keel/vault";
import type {
  DepositReceipt,
  FeeSchedule,
  PerformanceFeeReceipt,
  RoutePlan,
  RouteRequest,
  ShareLedgerSnapshot,
  Strategy,
  WithdrawReceipt,
} from "@keel/vault";
import type { Logger } from "pino";
import { BookCallExecutor } from "./book-call-executor.js";
import type { DispatchedCall } from "./book-call-executor.js";

// =============================================================================
// Configuration
// =============================================================================

export interface KeelServiceConfig {
  readonly asset: { readonly symbol: string; readonly decimals: number };
  readonly vault: {
    readonly vaultId: AccountId;
    readonly owner: AccountId;
    readonly fees?: Partial<FeeSchedule> | undefined;
    readonly feeRecipient?: AccountId | undefined;
    readonly minLiquidityReserve?: bigint | undefined;
  };
  readonly pool: {
    readonly poolId: AccountId;
    readonly annualRateBps?: Bps | undefined;
  };
}

export interface KeelServiceDeps {
  readonly authorizer: Authorizer;
  readonly logger: Logger;
  readonly clock?: Clock | undefined;
}

export type FeeKindName = "deposit" | "withdrawal" | "performance";

export type BookName = "asset" | "native";

export interface VaultState extends ShareLedgerSnapshot {
  readonly asset: { readonly symbol: string; readonly decimals: number };
  readonly totalAssets: string;
  readonly nativeBalance: string;
}

export interface PoolState extends InterestAccrualSnapshot {
  readonly liquidity: string;
  readonly now: number;
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "INTERNAL_ERROR";
}

// =============================================================================
// Service
// =============================================================================

export class KeelService {
  readonly assetBook: InMemoryTokenBook;
  readonly nativeBook: InMemoryTokenBook;
  readonly executor: BookCallExecutor;
  readonly vault: ShareLedger;
  readonly pool: InterestAccrualLedger;
  readonly clock: Clock;

  private readonly _config: KeelServiceConfig;
  private readonly _vaultLog: Logger;
  private readonly _lendingLog: Logger;
  private readonly _balancesLog: Logger;
  private _ready = false;

  constructor(config: KeelServiceConfig, deps: KeelServiceDeps) {
    // Both ledgers custody the same asset book; one account would pool their balances.
    if (config.vault.vaultId === config.pool.poolId) {
      throw new LedgerError(
        "INVALID_ACCOUNT",
        `Vault and pool cannot share custody account '${config.vault.vaultId}'`,
        { details: { vaultId: config.vault.vaultId, poolId: config.pool.poolId } },
      );
    }
    this._config = config;
    this.clock = deps.clock ?? new SystemClock();
    this._vaultLog = deps.logger.child({ component: "vault", vaultId: config.vault.vaultId });
    this._lendingLog = deps.logger.child({ component: "lending", poolId: config.pool.poolId });
    this._balancesLog = deps.logger.child({ component: "balances" });

    this.assetBook = new InMemoryTokenBook(config.asset.symbol);
    this.nativeBook = new InMemoryTokenBook("NATIVE");
    this.executor = new BookCallExecutor(this.nativeBook);

    this.vault = new ShareLedger(config.vault, {
      transfers: this.assetBook.agentFor(config.vault.vaultId),
      authorizer: deps.authorizer,
      executor: this.executor,
    });

    this.pool = new InterestAccrualLedger(config.pool, {
      transfers: this.assetBook.agentFor(config.pool.poolId),
      authorizer: deps.authorizer,
      clock: this.clock,
    });

    this._ready = true;
  }

  isReady(): boolean {
    return this._ready;
  }

  // ─── Vault: deposits and exits ─────────────────────────────────────

  deposit(caller: AccountId, assets: bigint, receiver: AccountId): DepositReceipt {
    return this.logged(this._vaultLog, "deposit", { caller, receiver, assets: assets.toString() }, () =>
      this.vault.deposit(caller, assets, receiver),
    );
  }

  withdraw(caller: AccountId, assets: bigint, receiver: AccountId, owner: AccountId): WithdrawReceipt {
    return this.logged(
      this._vaultLog,
      "withdraw",
      { caller, receiver, owner, assets: assets.toString() },
      () => this.vault.withdraw(caller, assets, receiver, owner),
    );
  }

  redeem(caller: AccountId, shares: bigint, receiver: AccountId, owner: AccountId): WithdrawReceipt {
    return this.logged(
      this._vaultLog,
      "redeem",
      { caller, receiver, owner, shares: shares.toString() },
      () => this.vault.redeem(caller, shares, receiver, owner),
    );
  }

  // ─── Vault: share token ────────────────────────────────────────────

  approve(owner: AccountId, spender: AccountId, shares: bigint): bigint {
    return this.logged(this._vaultLog, "approve", { owner, spender, shares: shares.toString() }, () =>
      this.vault.approve(owner, spender, shares),
    );
  }

  transferShares(caller: AccountId, from: AccountId, to: AccountId, shares: bigint): void {
    this.logged(this._vaultLog, "transferShares", { caller, from, to, shares: shares.toString() }, () => {
      if (from === caller) {
        this.vault.transferShares(caller, to, shares);
      } else {
        this.vault.transferSharesFrom(caller, from, to, shares);
      }
    });
  }

  // ─── Vault: routing ────────────────────────────────────────────────

  routeFunds(caller: AccountId, request: RouteRequest): RoutePlan {
    return this.logged(
      this._vaultLog,
      "routeFunds",
      { caller, destinations: request.destinations.length },
      () => this.vault.routeFunds(caller, request),
    );
  }

  registerStrategy(caller: AccountId, strategy: Strategy): Strategy {
    return this.logged(this._vaultLog, "registerStrategy", { caller, strategyId: strategy.id }, () =>
      this.vault.registerStrategy(caller, strategy),
    );
  }

  removeStrategy(caller: AccountId, id: string): Strategy {
    return this.logged(this._vaultLog, "removeStrategy", { caller, strategyId: id }, () =>
      this.vault.removeStrategy(caller, id),
    );
  }

  executeStrategy(caller: AccountId, id: string, payload: string, value: bigint): RoutePlan {
    return this.logged(
      this._vaultLog,
      "executeStrategy",
      { caller, strategyId: id, value: value.toString() },
      () => this.vault.executeStrategy(caller, id, payload, value),
    );
  }

  dispatchedCalls(): readonly DispatchedCall[] {
    return this.executor.dispatched();
  }

  // ─── Vault: fees and administration ────────────────────────────────

  collectPerformanceFee(caller: AccountId): PerformanceFeeReceipt {
    return this.logged(this._vaultLog, "collectPerformanceFee", { caller }, () =>
      this.vault.collectPerformanceFee(caller),
    );
  }

  setFee(caller: AccountId, kind: FeeKindName, bps: Bps): FeeSchedule {
    return this.logged(this._vaultLog, "setFee", { caller, kind, bps }, () => {
      switch (kind) {
        case "deposit":
          return this.vault.setDepositFee(caller, bps);
        case "withdrawal":
          return this.vault.setWithdrawalFee(caller, bps);
        case "performance":
          return this.vault.setPerformanceFee(caller, bps);
      }
    });
  }

  setFeeRecipient(caller: AccountId, recipient: AccountId): AccountId {
    return this.logged(this._vaultLog, "setFeeRecipient", { caller, recipient }, () =>
      this.vault.setFeeRecipient(caller, recipient),
    );
  }

  setMinLiquidityReserve(caller: AccountId, amount: bigint): bigint {
    return this.logged(
      this._vaultLog,
      "setMinLiquidityReserve",
      { caller, amount: amount.toString() },
      () => this.vault.setMinLiquidityReserve(caller, amount),
    );
  }

  transferOwnership(caller: AccountId, newOwner: AccountId): AccountId {
    return this.logged(this._vaultLog, "transferOwnership", { caller, newOwner }, () =>
      this.vault.transferOwnership(caller, newOwner),
    );
  }

  vaultState(): VaultState {
    return {
      ...this.vault.snapshot(),
      asset: this._config.asset,
      totalAssets: this.vault.totalAssets().toString(),
      nativeBalance: this.executor.nativeBalanceOf(this.vault.vaultId).toString(),
    };
  }

  // ─── Lending ───────────────────────────────────────────────────────

  poolDeposit(account: AccountId, amount: bigint): PrincipalDepositReceipt {
    return this.logged(this._lendingLog, "deposit", { account, amount: amount.toString() }, () =>
      this.pool.deposit(account, amount),
    );
  }

  poolWithdraw(account: AccountId, amount: bigint): PrincipalWithdrawalReceipt {
    return this.logged(this._lendingLog, "withdraw", { account, amount: amount.toString() }, () =>
      this.pool.withdraw(account, amount),
    );
  }

  accrue(account: AccountId): AccrualResult {
    return this.logged(this._lendingLog, "accrue", { account }, () => this.pool.accrue(account));
  }

  updateRate(caller: AccountId, annualRateBps: Bps): RateChange {
    return this.logged(this._lendingLog, "updateRate", { caller, annualRateBps }, () =>
      this.pool.updateRate(caller, annualRateBps),
    );
  }

  fundReserves(from: AccountId, amount: bigint): bigint {
    return this.logged(this._lendingLog, "fundReserves", { from, amount: amount.toString() }, () =>
      this.pool.fundReserves(from, amount),
    );
  }

  poolState(): PoolState {
    return {
      ...this.pool.snapshot(),
      liquidity: this.pool.liquidity().toString(),
      now: this.clock.now(),
    };
  }

  // ─── Balances ──────────────────────────────────────────────────────

  balanceOf(holder: AccountId, book: BookName): bigint {
    return this.book(book).balanceOf(holder);
  }

  /** Asset base units as a display amount. */
  display(amount: bigint): Money {
    return toMoney(amount, this._config.asset.symbol, this._config.asset.decimals);
  }

  /** Mint units on a book (faucet). */
  credit(holder: AccountId, amount: bigint, book: BookName): bigint {
    return this.logged(this._balancesLog, "credit", { holder, book, amount: amount.toString() }, () =>
      this.book(book).credit(holder, amount),
    );
  }

  // ─── Private ───────────────────────────────────────────────────────

  private book(name: BookName): InMemoryTokenBook {
    return name === "native" ? this.nativeBook : this.assetBook;
  }

  private logged<T>(
    log: Logger,
    operation: string,
    fields: Record<string, unknown>,
    fn: () => T,
  ): T {
    try {
      const result = fn();
      log.info({ operation, ...fields }, `${operation} committed`);
      return result;
    } catch (err) {
      log.warn({ operation, ...fields, code: errorCode(err) }, `${operation} rejected`);
      throw err;
    }
  }
}
