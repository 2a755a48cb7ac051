/**
 * InterestAccrualLedger — lending-pool principal and interest.
 *
 * Tracks principal per account and accrues simple annual interest
 * lazily: interest is only computed when an account is touched.
 *
 * Rules:
 * - One accrual instant is shared by the whole pool; accruing one
 *   account advances it for everyone, so accounts not touched in
 *   between lose that window
 * - Insufficient principal is rejected before any accrual
 * - Withdrawals release interest in proportion to the principal withdrawn
 * - State is committed before the payout transfer
 * - Every mutation is atomic and non-reentrant
 */

import {
  ReentrancyGuard,
  assertAmount,
  assertTimestamp,
  parseAmount,
  runAtomically,
} from "@keel/ledger";
import type { AtomicContext } from "@keel/ledger";
import { isAccountId } from "@keel/types";
import type { AccountId, Authorizer, Bps, Capability, Clock, TransferAgent } from "@keel/types";
import { assertRate, computeInterest, interestShare } from "./interest.js";
import type {
  AccrualResult,
  InterestAccrualSnapshot,
  LendingPoolConfig,
  LendingPoolDeps,
  Position,
  PrincipalDepositReceipt,
  PrincipalWithdrawalReceipt,
  RateChange,
} from "./types.js";
import { LendingError } from "./types.js";

// =============================================================================
// Internal state
// =============================================================================

interface PoolState {
  readonly principal: Map<AccountId, bigint>;
  readonly accrued: Map<AccountId, bigint>;
  totalPrincipal: bigint;
  annualRateBps: Bps;
  lastAccrualInstant: number;
}

function cloneState(state: PoolState): PoolState {
  return {
    principal: new Map(state.principal),
    accrued: new Map(state.accrued),
    totalPrincipal: state.totalPrincipal,
    annualRateBps: state.annualRateBps,
    lastAccrualInstant: state.lastAccrualInstant,
  };
}

function requireAccount(id: AccountId, field: string): void {
  if (!isAccountId(id)) {
    throw new LendingError("INVALID_ACCOUNT", `${field} must be a non-empty account id`);
  }
}

function requirePositive(amount: bigint): void {
  assertAmount(amount);
  if (amount === 0n) {
    throw new LendingError("ZERO_AMOUNT", "amount must be greater than zero");
  }
}

function setOrDelete(map: Map<AccountId, bigint>, account: AccountId, value: bigint): void {
  if (value === 0n) {
    map.delete(account);
  } else {
    map.set(account, value);
  }
}

// =============================================================================
// InterestAccrualLedger
// =============================================================================

export class InterestAccrualLedger {
  readonly poolId: AccountId;
  private readonly _transfers: TransferAgent;
  private readonly _authorizer: Authorizer;
  private readonly _clock: Clock;
  private readonly _ctx: AtomicContext<PoolState>;
  private _state: PoolState;

  constructor(config: LendingPoolConfig, deps: LendingPoolDeps) {
    requireAccount(config.poolId, "poolId");
    const rate = config.annualRateBps ?? 0;
    assertRate(rate);
    const now = deps.clock.now();
    assertTimestamp(now);

    this.poolId = config.poolId;
    this._transfers = deps.transfers;
    this._authorizer = deps.authorizer;
    this._clock = deps.clock;
    this._state = {
      principal: new Map(),
      accrued: new Map(),
      totalPrincipal: 0n,
      annualRateBps: rate,
      lastAccrualInstant: now,
    };
    this._ctx = {
      guard: new ReentrancyGuard(),
      transfers: deps.transfers,
      capture: () => cloneState(this._state),
      restore: (state) => {
        this._state = state;
      },
    };
  }

  // ─── Views ───────────────────────────────────────────────────────────

  get annualRateBps(): Bps {
    return this._state.annualRateBps;
  }

  get lastAccrualInstant(): number {
    return this._state.lastAccrualInstant;
  }

  get totalPrincipal(): bigint {
    return this._state.totalPrincipal;
  }

  principalOf(account: AccountId): bigint {
    return this._state.principal.get(account) ?? 0n;
  }

  /** Interest committed so far, without projecting elapsed time. */
  accruedInterestOf(account: AccountId): bigint {
    return this._state.accrued.get(account) ?? 0n;
  }

  /**
   * Interest `accrue` would leave on the account at instant `at`.
   */
  getAccruedInterest(account: AccountId, at: number = this._clock.now()): bigint {
    assertTimestamp(at);
    const elapsed = at - this._state.lastAccrualInstant;
    return (
      this.accruedInterestOf(account) +
      computeInterest(this.principalOf(account), this._state.annualRateBps, elapsed)
    );
  }

  /** Pool asset balance available for payouts. */
  liquidity(): bigint {
    return this._transfers.balanceOf(this.poolId);
  }

  /** Accounts with principal or interest, sorted. */
  positions(): readonly Position[] {
    const accounts = new Set([...this._state.principal.keys(), ...this._state.accrued.keys()]);
    return [...accounts]
      .sort((a, b) => a.localeCompare(b))
      .map((account) => ({
        account,
        principal: this.principalOf(account),
        accruedInterest: this.accruedInterestOf(account),
      }));
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Commit interest on `account` up to now. A second call at the same
   * instant adds nothing.
   */
  accrue(account: AccountId): AccrualResult {
    return runAtomically(this._ctx, "accrue", () => {
      requireAccount(account, "account");
      return this.accrueAccount(account);
    });
  }

  deposit(account: AccountId, amount: bigint): PrincipalDepositReceipt {
    return runAtomically(this._ctx, "deposit", (transfers) => {
      requireAccount(account, "account");
      requirePositive(amount);

      this.accrueAccount(account);
      transfers.pull(account, amount);

      const principal = this.principalOf(account) + amount;
      this._state.principal.set(account, principal);
      this._state.totalPrincipal += amount;

      return {
        account,
        amount,
        principal,
        accruedInterest: this.accruedInterestOf(account),
      };
    });
  }

  /**
   * Return `amount` of principal plus the proportional share of the
   * account's accrued interest.
   */
  withdraw(account: AccountId, amount: bigint): PrincipalWithdrawalReceipt {
    return runAtomically(this._ctx, "withdraw", (transfers) => {
      requireAccount(account, "account");
      requirePositive(amount);

      const held = this.principalOf(account);
      if (held < amount) {
        throw new LendingError(
          "INSUFFICIENT_BALANCE",
          `'${account}' has ${held.toString()} principal, requested ${amount.toString()}`,
        );
      }

      this.accrueAccount(account);
      const accrued = this.accruedInterestOf(account);
      const interest = interestShare(amount, accrued, held);

      const principal = held - amount;
      const remainingInterest = accrued - interest;
      setOrDelete(this._state.principal, account, principal);
      setOrDelete(this._state.accrued, account, remainingInterest);
      this._state.totalPrincipal -= amount;

      const paid = amount + interest;
      transfers.push(account, paid);

      return {
        account,
        amount,
        interest,
        paid,
        principal,
        accruedInterest: remainingInterest,
      };
    });
  }

  /**
   * Change the annual rate. The caller's own position accrues under
   * the old rate first.
   */
  updateRate(caller: AccountId, annualRateBps: Bps): RateChange {
    return runAtomically(this._ctx, "updateRate", () => {
      this.authorize(caller, "manage-rates");
      assertRate(annualRateBps);

      const accrual = this.accrueAccount(caller);
      const previousRateBps = this._state.annualRateBps;
      this._state.annualRateBps = annualRateBps;

      return { previousRateBps, annualRateBps, accrual };
    });
  }

  /**
   * Add liquidity that pays interest without creating principal.
   */
  fundReserves(from: AccountId, amount: bigint): bigint {
    return runAtomically(this._ctx, "fundReserves", (transfers) => {
      requireAccount(from, "from");
      requirePositive(amount);
      transfers.pull(from, amount);
      return this.liquidity();
    });
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): InterestAccrualSnapshot {
    return {
      version: 1,
      poolId: this.poolId,
      annualRateBps: this._state.annualRateBps,
      lastAccrualInstant: this._state.lastAccrualInstant,
      totalPrincipal: this._state.totalPrincipal.toString(),
      positions: this.positions().map((p) => ({
        account: p.account,
        principal: p.principal.toString(),
        accruedInterest: p.accruedInterest.toString(),
      })),
    };
  }

  static fromSnapshot(
    snapshot: InterestAccrualSnapshot,
    deps: LendingPoolDeps,
  ): InterestAccrualLedger {
    const ledger = new InterestAccrualLedger(
      { poolId: snapshot.poolId, annualRateBps: snapshot.annualRateBps },
      deps,
    );
    assertTimestamp(snapshot.lastAccrualInstant);

    const state = ledger._state;
    let sum = 0n;
    const seen = new Set<AccountId>();
    for (const position of snapshot.positions) {
      requireAccount(position.account, "account");
      if (seen.has(position.account)) {
        throw new LendingError(
          "INVALID_SNAPSHOT",
          `Account '${position.account}' appears more than once`,
        );
      }
      seen.add(position.account);
      const principal = parseAmount(position.principal);
      setOrDelete(state.principal, position.account, principal);
      setOrDelete(state.accrued, position.account, parseAmount(position.accruedInterest));
      sum += principal;
    }

    const totalPrincipal = parseAmount(snapshot.totalPrincipal);
    if (sum !== totalPrincipal) {
      throw new LendingError(
        "INVALID_SNAPSHOT",
        `Positions sum to ${sum.toString()} but totalPrincipal is ${totalPrincipal.toString()}`,
      );
    }
    state.totalPrincipal = totalPrincipal;
    state.lastAccrualInstant = snapshot.lastAccrualInstant;

    return ledger;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private authorize(caller: AccountId, capability: Capability): void {
    if (!this._authorizer.isAuthorized(caller, capability)) {
      throw new LendingError(
        "UNAUTHORIZED_CALLER",
        `'${caller}' is not authorized to ${capability}`,
      );
    }
  }

  private accrueAccount(account: AccountId): AccrualResult {
    const now = this._clock.now();
    assertTimestamp(now);
    const last = this._state.lastAccrualInstant;

    if (now <= last) {
      return {
        account,
        interestDelta: 0n,
        accruedInterest: this.accruedInterestOf(account),
        elapsed: 0,
        at: last,
      };
    }

    const elapsed = now - last;
    const interestDelta = computeInterest(
      this.principalOf(account),
      this._state.annualRateBps,
      elapsed,
    );
    const accruedInterest = this.accruedInterestOf(account) + interestDelta;
    setOrDelete(this._state.accrued, account, accruedInterest);
    this._state.lastAccrualInstant = now;

    return { account, interestDelta, accruedInterest, elapsed, at: now };
  }
}
