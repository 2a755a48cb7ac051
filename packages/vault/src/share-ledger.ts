/**
 * ShareLedger — single-asset vault share accounting.
 *
 * Converts between deposited assets and minted/burned shares under
 * basis-point fees, keeps holder balances and allowances, and gates
 * agent fund routing behind a minimum liquidity reserve.
 *
 * API surface:
 * - deposit() / withdraw() / redeem() — move assets in and out for shares
 * - approve() / transferShares() / transferSharesFrom() — share token
 * - routeFunds() / executeStrategy() — agent routing of native value
 * - collectPerformanceFee() — naive fee on the whole custodied balance
 * - set*Fee() / setFeeRecipient() / setMinLiquidityReserve() — admin
 * - snapshot() / fromSnapshot() — persistence
 *
 * Every mutation runs atomically under one reentrancy guard: spent or
 * burned balances are committed before any outbound transfer, and any
 * failure restores state and reverses the transfers already made.
 */

import {
  ReentrancyGuard,
  assertAmount,
  bpsOf,
  parseAmount,
  runAtomically,
} from "@keel/ledger";
import type { AtomicContext, TransferSession } from "@keel/ledger";
import { isAccountId } from "@keel/types";
import type {
  AccountId,
  Authorizer,
  Bps,
  CallExecutor,
  Capability,
  TransferAgent,
} from "@keel/types";
import { assertFee, resolveFees, splitFee } from "./fees.js";
import type { FeeKind } from "./fees.js";
import { planRoute } from "./routing.js";
import type { RouteRequest } from "./routing.js";
import {
  convertToAssets,
  convertToShares,
  previewDeposit,
  previewRedeem,
  previewWithdraw,
} from "./share-math.js";
import type { VaultTotals } from "./share-math.js";
import type {
  DepositReceipt,
  FeeSchedule,
  PerformanceFeeReceipt,
  Quote,
  RoutePlan,
  ShareLedgerConfig,
  ShareLedgerDeps,
  ShareLedgerSnapshot,
  Strategy,
  WithdrawReceipt,
} from "./types.js";
import { VaultError } from "./types.js";

// =============================================================================
// Internal state
// =============================================================================

interface ShareState {
  readonly shares: Map<AccountId, bigint>;
  readonly allowances: Map<AccountId, Map<AccountId, bigint>>;
  readonly strategies: Map<string, Strategy>;
  totalShares: bigint;
  fees: FeeSchedule;
  feeRecipient: AccountId | undefined;
  minLiquidityReserve: bigint;
  owner: AccountId;
}

function cloneState(state: ShareState): ShareState {
  return {
    shares: new Map(state.shares),
    allowances: new Map(
      [...state.allowances].map(([owner, spenders]) => [owner, new Map(spenders)]),
    ),
    strategies: new Map(state.strategies),
    totalShares: state.totalShares,
    fees: state.fees,
    feeRecipient: state.feeRecipient,
    minLiquidityReserve: state.minLiquidityReserve,
    owner: state.owner,
  };
}

function requireAccount(id: AccountId, field: string): void {
  if (!isAccountId(id)) {
    throw new VaultError("INVALID_ACCOUNT", `${field} must be a non-empty account id`);
  }
}

function requirePositive(amount: bigint, field: string): void {
  assertAmount(amount, field);
  if (amount === 0n) {
    throw new VaultError("ZERO_AMOUNT", `${field} must be greater than zero`);
  }
}

// =============================================================================
// ShareLedger
// =============================================================================

export class ShareLedger {
  readonly vaultId: AccountId;
  private readonly _transfers: TransferAgent;
  private readonly _authorizer: Authorizer;
  private readonly _executor: CallExecutor | undefined;
  private readonly _ctx: AtomicContext<ShareState>;
  private _state: ShareState;

  constructor(config: ShareLedgerConfig, deps: ShareLedgerDeps) {
    requireAccount(config.vaultId, "vaultId");
    requireAccount(config.owner, "owner");
    if (config.feeRecipient !== undefined && !isAccountId(config.feeRecipient)) {
      throw new VaultError("INVALID_FEE_RECIPIENT", "Fee recipient must be a non-empty account id");
    }
    const reserve = config.minLiquidityReserve ?? 0n;
    assertAmount(reserve, "minLiquidityReserve");

    this.vaultId = config.vaultId;
    this._transfers = deps.transfers;
    this._authorizer = deps.authorizer;
    this._executor = deps.executor;
    this._state = {
      shares: new Map(),
      allowances: new Map(),
      strategies: new Map(),
      totalShares: 0n,
      fees: resolveFees(config.fees),
      feeRecipient: config.feeRecipient,
      minLiquidityReserve: reserve,
      owner: config.owner,
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

  get owner(): AccountId {
    return this._state.owner;
  }

  get totalShares(): bigint {
    return this._state.totalShares;
  }

  get fees(): FeeSchedule {
    return this._state.fees;
  }

  get feeRecipient(): AccountId | undefined {
    return this._state.feeRecipient;
  }

  get minLiquidityReserve(): bigint {
    return this._state.minLiquidityReserve;
  }

  /** Assets currently custodied, as reported by the transfer agent. */
  totalAssets(): bigint {
    return this._transfers.balanceOf(this.vaultId);
  }

  balanceOf(holder: AccountId): bigint {
    return this._state.shares.get(holder) ?? 0n;
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this._state.allowances.get(owner)?.get(spender) ?? 0n;
  }

  /** Non-zero share balances, sorted by holder. */
  holders(): readonly { holder: AccountId; shares: bigint }[] {
    return [...this._state.shares.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([holder, shares]) => ({ holder, shares }));
  }

  getStrategy(id: string): Strategy | undefined {
    return this._state.strategies.get(id);
  }

  listStrategies(): readonly Strategy[] {
    return [...this._state.strategies.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  // ─── Pricing (pure) ──────────────────────────────────────────────────

  convertToShares(assets: bigint): bigint {
    assertAmount(assets, "assets");
    return convertToShares(this.totals(), assets);
  }

  convertToAssets(shares: bigint): bigint {
    assertAmount(shares, "shares");
    return convertToAssets(this.totals(), shares);
  }

  previewDeposit(assets: bigint): bigint {
    assertAmount(assets, "assets");
    return previewDeposit(this.totals(), assets);
  }

  previewWithdraw(assets: bigint): bigint {
    assertAmount(assets, "assets");
    return previewWithdraw(this.totals(), assets);
  }

  previewRedeem(shares: bigint): bigint {
    assertAmount(shares, "shares");
    return previewRedeem(this.totals(), shares);
  }

  /** Fee, net assets and shares a deposit of `assets` would produce. */
  quoteDeposit(assets: bigint): Quote {
    assertAmount(assets, "assets");
    const { fee, net } = splitFee(assets, this._state.fees.depositFeeBps);
    return { assets, fee, netAssets: net, shares: previewDeposit(this.totals(), net) };
  }

  /** Shares burned and assets delivered for a withdrawal of `assets`. */
  quoteWithdraw(assets: bigint): Quote {
    assertAmount(assets, "assets");
    const { fee, net } = splitFee(assets, this._state.fees.withdrawalFeeBps);
    return { assets, fee, netAssets: net, shares: previewWithdraw(this.totals(), assets) };
  }

  /** Assets released and delivered for redeeming `shares`. */
  quoteRedeem(shares: bigint): Quote {
    assertAmount(shares, "shares");
    const assets = previewRedeem(this.totals(), shares);
    const { fee, net } = splitFee(assets, this._state.fees.withdrawalFeeBps);
    return { assets, fee, netAssets: net, shares };
  }

  maxWithdraw(owner: AccountId): bigint {
    const worth = convertToAssets(this.totals(), this.balanceOf(owner));
    const held = this.totalAssets();
    return worth < held ? worth : held;
  }

  maxRedeem(owner: AccountId): bigint {
    return this.balanceOf(owner);
  }

  // ─── Deposit / Withdraw / Redeem ─────────────────────────────────────

  /**
   * Pull `assets` from the caller and mint shares for the net amount
   * to `receiver`. Shares are priced before the pull.
   */
  deposit(caller: AccountId, assets: bigint, receiver: AccountId): DepositReceipt {
    return runAtomically(this._ctx, "deposit", (transfers) => {
      requireAccount(caller, "caller");
      requireAccount(receiver, "receiver");
      requirePositive(assets, "assets");

      const quote = this.quoteDeposit(assets);
      if (quote.shares === 0n) {
        throw new VaultError(
          "ZERO_SHARES",
          `Deposit of ${assets.toString()} mints zero shares at the current price`,
        );
      }

      transfers.pull(caller, assets);
      const feeTransferred = this.payFee(transfers, quote.fee);
      this.mint(receiver, quote.shares);

      return {
        caller,
        receiver,
        assets,
        fee: quote.fee,
        feeTransferred,
        netAssets: quote.netAssets,
        shares: quote.shares,
      };
    });
  }

  /**
   * Take exactly `assets` out of custody, burning the shares that
   * cover them from `owner`. The receiver gets the amount net of the
   * withdrawal fee.
   */
  withdraw(
    caller: AccountId,
    assets: bigint,
    receiver: AccountId,
    owner: AccountId,
  ): WithdrawReceipt {
    return runAtomically(this._ctx, "withdraw", (transfers) => {
      requireAccount(caller, "caller");
      requireAccount(receiver, "receiver");
      requireAccount(owner, "owner");
      requirePositive(assets, "assets");
      this.assertCustodied(assets);

      return this.exit(transfers, caller, receiver, owner, this.quoteWithdraw(assets));
    });
  }

  /**
   * Burn exactly `shares` from `owner` and release the assets they
   * are worth, net of the withdrawal fee.
   */
  redeem(
    caller: AccountId,
    shares: bigint,
    receiver: AccountId,
    owner: AccountId,
  ): WithdrawReceipt {
    return runAtomically(this._ctx, "redeem", (transfers) => {
      requireAccount(caller, "caller");
      requireAccount(receiver, "receiver");
      requireAccount(owner, "owner");
      requirePositive(shares, "shares");

      const quote = this.quoteRedeem(shares);
      if (quote.assets === 0n) {
        throw new VaultError(
          "ZERO_ASSETS",
          `Redeeming ${shares.toString()} shares releases zero assets`,
        );
      }
      this.assertCustodied(quote.assets);

      return this.exit(transfers, caller, receiver, owner, quote);
    });
  }

  // ─── Share token ─────────────────────────────────────────────────────

  approve(owner: AccountId, spender: AccountId, shares: bigint): bigint {
    return runAtomically(this._ctx, "approve", () => {
      requireAccount(owner, "owner");
      requireAccount(spender, "spender");
      assertAmount(shares, "shares");

      let spenders = this._state.allowances.get(owner);
      if (spenders === undefined) {
        spenders = new Map();
        this._state.allowances.set(owner, spenders);
      }
      spenders.set(spender, shares);
      return shares;
    });
  }

  transferShares(caller: AccountId, to: AccountId, shares: bigint): void {
    runAtomically(this._ctx, "transferShares", () => {
      requireAccount(caller, "caller");
      requireAccount(to, "to");
      requirePositive(shares, "shares");
      this.move(caller, to, shares);
    });
  }

  transferSharesFrom(caller: AccountId, from: AccountId, to: AccountId, shares: bigint): void {
    runAtomically(this._ctx, "transferSharesFrom", () => {
      requireAccount(caller, "caller");
      requireAccount(from, "from");
      requireAccount(to, "to");
      requirePositive(shares, "shares");
      if (caller !== from) {
        this.spendAllowance(from, caller, shares);
      }
      this.move(from, to, shares);
    });
  }

  // ─── Routing ─────────────────────────────────────────────────────────

  /**
   * Validate a batch of outbound calls against the liquidity reserve
   * and hand them to the executor.
   */
  routeFunds(caller: AccountId, request: RouteRequest): RoutePlan {
    return runAtomically(this._ctx, "routeFunds", () => {
      this.authorize(caller, "route-funds");
      return this.route(request);
    });
  }

  registerStrategy(caller: AccountId, strategy: Strategy): Strategy {
    return runAtomically(this._ctx, "registerStrategy", () => {
      this.authorize(caller, "manage-strategies");
      if (strategy.id.trim() === "") {
        throw new VaultError("INVALID_STRATEGY_ID", "Strategy id must be non-empty");
      }
      requireAccount(strategy.destination, "destination");
      if (this._state.strategies.has(strategy.id)) {
        throw new VaultError("STRATEGY_EXISTS", `Strategy '${strategy.id}' already exists`);
      }

      const stored: Strategy = { ...strategy };
      this._state.strategies.set(strategy.id, stored);
      return stored;
    });
  }

  removeStrategy(caller: AccountId, id: string): Strategy {
    return runAtomically(this._ctx, "removeStrategy", () => {
      this.authorize(caller, "manage-strategies");
      const strategy = this.requireStrategy(id);
      this._state.strategies.delete(id);
      return strategy;
    });
  }

  /**
   * Route a single call with `value` to a registered strategy.
   */
  executeStrategy(caller: AccountId, id: string, payload: string, value: bigint): RoutePlan {
    return runAtomically(this._ctx, "executeStrategy", () => {
      this.authorize(caller, "route-funds");
      const strategy = this.requireStrategy(id);
      return this.route({
        destinations: [strategy.destination],
        payloads: [payload],
        values: [value],
      });
    });
  }

  // ─── Fees ────────────────────────────────────────────────────────────

  /**
   * Charge the performance fee against the entire custodied balance.
   * Nothing moves unless both the fee and the recipient are set.
   */
  collectPerformanceFee(caller: AccountId): PerformanceFeeReceipt {
    return runAtomically(this._ctx, "collectPerformanceFee", (transfers) => {
      this.authorize(caller, "collect-fees");
      const base = this.totalAssets();
      const fee = bpsOf(base, this._state.fees.performanceFeeBps);
      const transferred = this.payFee(transfers, fee);
      return { base, fee: transferred ? fee : 0n, transferred };
    });
  }

  setDepositFee(caller: AccountId, bps: Bps): FeeSchedule {
    return this.setFee(caller, "depositFeeBps", bps);
  }

  setWithdrawalFee(caller: AccountId, bps: Bps): FeeSchedule {
    return this.setFee(caller, "withdrawalFeeBps", bps);
  }

  setPerformanceFee(caller: AccountId, bps: Bps): FeeSchedule {
    return this.setFee(caller, "performanceFeeBps", bps);
  }

  setFeeRecipient(caller: AccountId, recipient: AccountId): AccountId {
    return runAtomically(this._ctx, "setFeeRecipient", () => {
      this.authorize(caller, "manage-fees");
      if (!isAccountId(recipient)) {
        throw new VaultError("INVALID_FEE_RECIPIENT", "Fee recipient must be a non-empty account id");
      }
      this._state.feeRecipient = recipient;
      return recipient;
    });
  }

  setMinLiquidityReserve(caller: AccountId, amount: bigint): bigint {
    return runAtomically(this._ctx, "setMinLiquidityReserve", () => {
      this.authorize(caller, "manage-reserve");
      assertAmount(amount, "minLiquidityReserve");
      this._state.minLiquidityReserve = amount;
      return amount;
    });
  }

  /** Returns the previous owner. */
  transferOwnership(caller: AccountId, newOwner: AccountId): AccountId {
    return runAtomically(this._ctx, "transferOwnership", () => {
      this.authorize(caller, "transfer-ownership");
      requireAccount(newOwner, "newOwner");
      const previous = this._state.owner;
      this._state.owner = newOwner;
      return previous;
    });
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): ShareLedgerSnapshot {
    const state = this._state;
    return {
      version: 1,
      vaultId: this.vaultId,
      owner: state.owner,
      fees: state.fees,
      feeRecipient: state.feeRecipient,
      minLiquidityReserve: state.minLiquidityReserve.toString(),
      totalShares: state.totalShares.toString(),
      holders: this.holders().map(({ holder, shares }) => ({ holder, shares: shares.toString() })),
      allowances: [...state.allowances].flatMap(([owner, spenders]) =>
        [...spenders].map(([spender, shares]) => ({ owner, spender, shares: shares.toString() })),
      ),
      strategies: this.listStrategies(),
    };
  }

  /**
   * Restore a ledger from a snapshot. Each holder appears once and
   * their balances must add up to the recorded total.
   */
  static fromSnapshot(snapshot: ShareLedgerSnapshot, deps: ShareLedgerDeps): ShareLedger {
    const ledger = new ShareLedger(
      {
        vaultId: snapshot.vaultId,
        owner: snapshot.owner,
        fees: snapshot.fees,
        feeRecipient: snapshot.feeRecipient,
        minLiquidityReserve: parseAmount(snapshot.minLiquidityReserve),
      },
      deps,
    );

    const state = ledger._state;
    let sum = 0n;
    const seen = new Set<AccountId>();
    for (const { holder, shares } of snapshot.holders) {
      requireAccount(holder, "holder");
      if (seen.has(holder)) {
        throw new VaultError("INVALID_SNAPSHOT", `Holder '${holder}' appears more than once`);
      }
      seen.add(holder);
      const amount = parseAmount(shares);
      if (amount > 0n) {
        state.shares.set(holder, amount);
        sum += amount;
      }
    }

    const totalShares = parseAmount(snapshot.totalShares);
    if (sum !== totalShares) {
      throw new VaultError(
        "INVALID_SNAPSHOT",
        `Holder balances sum to ${sum.toString()} but totalShares is ${totalShares.toString()}`,
      );
    }
    state.totalShares = totalShares;

    for (const { owner, spender, shares } of snapshot.allowances) {
      let spenders = state.allowances.get(owner);
      if (spenders === undefined) {
        spenders = new Map();
        state.allowances.set(owner, spenders);
      }
      spenders.set(spender, parseAmount(shares));
    }

    for (const strategy of snapshot.strategies) {
      state.strategies.set(strategy.id, { ...strategy });
    }

    return ledger;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private totals(): VaultTotals {
    return { totalAssets: this.totalAssets(), totalShares: this._state.totalShares };
  }

  private authorize(caller: AccountId, capability: Capability): void {
    if (!this._authorizer.isAuthorized(caller, capability)) {
      throw new VaultError(
        "UNAUTHORIZED_CALLER",
        `'${caller}' is not authorized to ${capability}`,
      );
    }
  }

  private assertCustodied(assets: bigint): void {
    const held = this.totalAssets();
    if (assets > held) {
      throw new VaultError(
        "INSUFFICIENT_FUNDS",
        `Requested ${assets.toString()} but the vault holds ${held.toString()}`,
      );
    }
  }

  private requireStrategy(id: string): Strategy {
    const strategy = this._state.strategies.get(id);
    if (strategy === undefined) {
      throw new VaultError("INVALID_STRATEGY_ID", `Strategy '${id}' is not registered`);
    }
    return strategy;
  }

  private route(request: RouteRequest): RoutePlan {
    if (this._executor === undefined) {
      throw new VaultError("ROUTING_UNAVAILABLE", "No call executor configured for this vault");
    }
    const plan = planRoute(
      request,
      this._executor.nativeBalanceOf(this.vaultId),
      this._state.minLiquidityReserve,
    );
    this._executor.execute(this.vaultId, plan.calls);
    return plan;
  }

  /** Burn, then pay the fee, then pay the receiver. */
  private exit(
    transfers: TransferSession,
    caller: AccountId,
    receiver: AccountId,
    owner: AccountId,
    quote: Quote,
  ): WithdrawReceipt {
    if (caller !== owner) {
      this.spendAllowance(owner, caller, quote.shares);
    }
    this.burn(owner, quote.shares);

    const feeTransferred = this.payFee(transfers, quote.fee);
    transfers.push(receiver, quote.netAssets);

    return {
      caller,
      receiver,
      owner,
      assets: quote.assets,
      fee: quote.fee,
      feeTransferred,
      netAssets: quote.netAssets,
      shares: quote.shares,
    };
  }

  private payFee(transfers: TransferSession, fee: bigint): boolean {
    const recipient = this._state.feeRecipient;
    if (fee === 0n || recipient === undefined) {
      return false;
    }
    transfers.push(recipient, fee);
    return true;
  }

  private setFee(caller: AccountId, kind: FeeKind, bps: Bps): FeeSchedule {
    return runAtomically(this._ctx, `set:${kind}`, () => {
      this.authorize(caller, "manage-fees");
      assertFee(kind, bps);
      this._state.fees = { ...this._state.fees, [kind]: bps };
      return this._state.fees;
    });
  }

  private spendAllowance(owner: AccountId, spender: AccountId, shares: bigint): void {
    const current = this.allowance(owner, spender);
    if (current < shares) {
      throw new VaultError(
        "INSUFFICIENT_ALLOWANCE",
        `'${spender}' may spend ${current.toString()} of '${owner}' shares, needs ${shares.toString()}`,
      );
    }
    this._state.allowances.get(owner)?.set(spender, current - shares);
  }

  private mint(holder: AccountId, shares: bigint): void {
    this._state.shares.set(holder, this.balanceOf(holder) + shares);
    this._state.totalShares += shares;
  }

  private burn(holder: AccountId, shares: bigint): void {
    const balance = this.balanceOf(holder);
    if (balance < shares) {
      throw new VaultError(
        "INSUFFICIENT_BALANCE",
        `'${holder}' holds ${balance.toString()} shares, needs ${shares.toString()}`,
      );
    }
    this.setBalance(holder, balance - shares);
    this._state.totalShares -= shares;
  }

  private move(from: AccountId, to: AccountId, shares: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < shares) {
      throw new VaultError(
        "INSUFFICIENT_BALANCE",
        `'${from}' holds ${balance.toString()} shares, needs ${shares.toString()}`,
      );
    }
    this.setBalance(from, balance - shares);
    this.setBalance(to, this.balanceOf(to) + shares);
  }

  private setBalance(holder: AccountId, shares: bigint): void {
    if (shares === 0n) {
      this._state.shares.delete(holder);
    } else {
      this._state.shares.set(holder, shares);
    }
  }
}
