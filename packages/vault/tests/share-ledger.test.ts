/**
 * Tests for ShareLedger — deposits, exits, share token, fees, routing.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryTokenBook } from "@keel/ledger";
import type { TransferAgent } from "@keel/types";
import { ShareLedger } from "../src/share-ledger.js";
import {
  AGENT,
  DEFAULT_AUTHORIZER,
  OWNER,
  TREASURY,
  VAULT,
  createVault,
} from "./fixtures.js";
import type { VaultFixture } from "./fixtures.js";

function code(expected: string) {
  return expect.objectContaining({ code: expected });
}

// =============================================================================
// Deposit
// =============================================================================

describe("ShareLedger deposit", () => {
  it("charges the deposit fee and mints shares for the net amount", () => {
    const { book, ledger } = createVault({
      fees: { depositFeeBps: 50 },
      feeRecipient: TREASURY,
    });
    book.credit("alice", 1_000n);

    const receipt = ledger.deposit("alice", 1_000n, "alice");

    expect(receipt).toEqual({
      caller: "alice",
      receiver: "alice",
      assets: 1_000n,
      fee: 5n,
      feeTransferred: true,
      netAssets: 995n,
      shares: 995n,
    });
    expect(book.balanceOf("alice")).toBe(0n);
    expect(book.balanceOf(TREASURY)).toBe(5n);
    expect(ledger.totalAssets()).toBe(995n);
    expect(ledger.totalShares).toBe(995n);
    expect(ledger.balanceOf("alice")).toBe(995n);
  });

  it("keeps the fee in the vault when no recipient is set", () => {
    const { book, ledger } = createVault({ fees: { depositFeeBps: 50 } });
    book.credit("alice", 1_000n);

    const receipt = ledger.deposit("alice", 1_000n, "alice");

    expect(receipt.feeTransferred).toBe(false);
    expect(receipt.shares).toBe(995n);
    expect(ledger.totalAssets()).toBe(1_000n);
    expect(ledger.convertToAssets(995n)).toBe(1_000n);
  });

  it("mints to a receiver other than the payer", () => {
    const { book, ledger } = createVault();
    book.credit("alice", 400n);
    ledger.deposit("alice", 400n, "bob");
    expect(ledger.balanceOf("alice")).toBe(0n);
    expect(ledger.balanceOf("bob")).toBe(400n);
  });

  it("prices later deposits at the current asset-per-share ratio", () => {
    const { book, ledger } = createVault();
    book.credit("alice", 1_000n);
    book.credit("bob", 500n);
    ledger.deposit("alice", 1_000n, "alice");
    book.credit(VAULT, 1_000n);

    const receipt = ledger.deposit("bob", 500n, "bob");

    expect(receipt.shares).toBe(250n);
    expect(ledger.totalShares).toBe(1_250n);
  });

  it("rejects a zero deposit", () => {
    const { ledger } = createVault();
    expect(() => ledger.deposit("alice", 0n, "alice")).toThrow(code("ZERO_AMOUNT"));
  });

  it("rejects the null receiver", () => {
    const { book, ledger } = createVault();
    book.credit("alice", 10n);
    expect(() => ledger.deposit("alice", 10n, "")).toThrow(code("INVALID_ACCOUNT"));
  });

  it("rejects a deposit too small to mint a share and pulls nothing", () => {
    const { book, ledger } = createVault();
    book.credit("alice", 1_000n);
    book.credit("bob", 1n);
    ledger.deposit("alice", 1_000n, "alice");
    book.credit(VAULT, 1_000_000n);

    expect(() => ledger.deposit("bob", 1n, "bob")).toThrow(code("ZERO_SHARES"));
    expect(book.balanceOf("bob")).toBe(1n);
  });

  it("fails with TRANSFER_FAILED when the payer cannot cover it", () => {
    const { book, ledger } = createVault();
    book.credit("alice", 10n);
    expect(() => ledger.deposit("alice", 11n, "alice")).toThrow(code("TRANSFER_FAILED"));
    expect(ledger.totalShares).toBe(0n);
  });

  it("re-initialises pricing 1:1 once custodied assets reach zero", () => {
    const { book, ledger } = createVault();
    book.credit("alice", 1_000n);
    book.credit("bob", 100n);
    ledger.deposit("alice", 1_000n, "alice");
    book.transfer(VAULT, "sink", 1_000n);

    const receipt = ledger.deposit("bob", 100n, "bob");

    expect(receipt.shares).toBe(100n);
    expect(ledger.totalShares).toBe(1_100n);
    // 1000 * 100 / 1100
    expect(ledger.convertToAssets(1_000n)).toBe(90n);
  });
});

// =============================================================================
// Withdraw / Redeem
// =============================================================================

describe("ShareLedger withdraw and redeem", () => {
  let fx: VaultFixture;

  beforeEach(() => {
    fx = createVault();
    fx.book.credit("alice", 1_000n);
    fx.ledger.deposit("alice", 1_000n, "alice");
    fx.book.credit(VAULT, 500n);
  });

  it("burns shares rounded up for an exact asset amount", () => {
    const receipt = fx.ledger.withdraw("alice", 301n, "alice", "alice");

    expect(receipt.shares).toBe(201n);
    expect(receipt.netAssets).toBe(301n);
    expect(fx.ledger.balanceOf("alice")).toBe(799n);
    expect(fx.book.balanceOf("alice")).toBe(301n);
    expect(fx.ledger.totalAssets()).toBe(1_199n);
  });

  it("matches previewWithdraw exactly", () => {
    const preview = fx.ledger.previewWithdraw(301n);
    const receipt = fx.ledger.withdraw("alice", 301n, "alice", "alice");
    expect(receipt.shares).toBe(preview);
  });

  it("redeems shares for assets rounded down", () => {
    const receipt = fx.ledger.redeem("alice", 100n, "alice", "alice");

    expect(receipt.assets).toBe(150n);
    expect(fx.book.balanceOf("alice")).toBe(150n);
    expect(fx.ledger.balanceOf("alice")).toBe(900n);
  });

  it("reports max withdraw and max redeem", () => {
    expect(fx.ledger.maxWithdraw("alice")).toBe(1_500n);
    expect(fx.ledger.maxRedeem("alice")).toBe(1_000n);
    expect(fx.ledger.maxWithdraw("nobody")).toBe(0n);
  });

  it("rejects withdrawing more than the vault holds", () => {
    expect(() => fx.ledger.withdraw("alice", 1_501n, "alice", "alice")).toThrow(
      code("INSUFFICIENT_FUNDS"),
    );
  });

  it("rejects burning more shares than the owner holds", () => {
    fx.book.credit("bob", 100n);
    // 100 * 1000 / 1500 = 66 shares
    fx.ledger.deposit("bob", 100n, "bob");
    expect(() => fx.ledger.withdraw("bob", 200n, "bob", "bob")).toThrow(
      code("INSUFFICIENT_BALANCE"),
    );
    expect(fx.ledger.balanceOf("bob")).toBe(66n);
  });

  it("requires an allowance to exit on behalf of another owner", () => {
    expect(() => fx.ledger.withdraw("bob", 150n, "bob", "alice")).toThrow(
      code("INSUFFICIENT_ALLOWANCE"),
    );

    fx.ledger.approve("alice", "bob", 150n);
    const receipt = fx.ledger.withdraw("bob", 150n, "bob", "alice");

    expect(receipt.shares).toBe(100n);
    expect(fx.book.balanceOf("bob")).toBe(150n);
    expect(fx.ledger.balanceOf("alice")).toBe(900n);
    expect(fx.ledger.allowance("alice", "bob")).toBe(50n);
  });

  it("rejects a redemption worth zero assets", () => {
    const { book, ledger } = createVault();
    book.credit("alice", 1_000n);
    ledger.deposit("alice", 1_000n, "alice");
    book.transfer(VAULT, "sink", 999n);

    expect(() => ledger.redeem("alice", 1n, "alice", "alice")).toThrow(code("ZERO_ASSETS"));
  });

  it("rejects zero amounts", () => {
    expect(() => fx.ledger.withdraw("alice", 0n, "alice", "alice")).toThrow(code("ZERO_AMOUNT"));
    expect(() => fx.ledger.redeem("alice", 0n, "alice", "alice")).toThrow(code("ZERO_AMOUNT"));
  });
});

describe("ShareLedger withdrawal fee", () => {
  it("sends the fee to the recipient and the rest to the receiver", () => {
    const { book, ledger } = createVault({
      fees: { withdrawalFeeBps: 100 },
      feeRecipient: TREASURY,
    });
    book.credit("alice", 1_000n);
    ledger.deposit("alice", 1_000n, "alice");

    const receipt = ledger.withdraw("alice", 300n, "alice", "alice");

    expect(receipt).toMatchObject({ assets: 300n, fee: 3n, netAssets: 297n, shares: 300n });
    expect(book.balanceOf("alice")).toBe(297n);
    expect(book.balanceOf(TREASURY)).toBe(3n);
    expect(ledger.totalAssets()).toBe(700n);
    expect(ledger.balanceOf("alice")).toBe(700n);
  });

  it("quotes what a withdrawal will apply", () => {
    const { book, ledger } = createVault({ fees: { withdrawalFeeBps: 100 } });
    book.credit("alice", 1_000n);
    ledger.deposit("alice", 1_000n, "alice");

    expect(ledger.quoteWithdraw(300n)).toEqual({
      assets: 300n,
      fee: 3n,
      netAssets: 297n,
      shares: 300n,
    });
    expect(ledger.quoteRedeem(500n)).toEqual({
      assets: 500n,
      fee: 5n,
      netAssets: 495n,
      shares: 500n,
    });
  });
});

// =============================================================================
// Atomicity
// =============================================================================

describe("ShareLedger atomicity", () => {
  it("rejects reentrant calls made from inside a transfer", () => {
    const book = new InMemoryTokenBook("USDC");
    book.credit("alice", 1_000n);
    const inner = book.agentFor(VAULT);
    let target: ShareLedger | undefined;
    const agent: TransferAgent = {
      pull: (from, amount) => {
        target?.deposit("alice", 1n, "alice");
        return inner.pull(from, amount);
      },
      push: (to, amount) => inner.push(to, amount),
      balanceOf: (holder) => inner.balanceOf(holder),
    };
    const ledger = new ShareLedger(
      { vaultId: VAULT, owner: OWNER },
      { transfers: agent, authorizer: DEFAULT_AUTHORIZER },
    );
    target = ledger;

    expect(() => ledger.deposit("alice", 500n, "alice")).toThrow(code("REENTRANT_CALL"));
    expect(book.balanceOf("alice")).toBe(1_000n);
    expect(ledger.totalShares).toBe(0n);
  });

  it("reverses the pull when the fee transfer fails", () => {
    const book = new InMemoryTokenBook("USDC");
    book.credit("alice", 1_000n);
    const inner = book.agentFor(VAULT);
    const agent: TransferAgent = {
      pull: (from, amount) => inner.pull(from, amount),
      push: (to, amount) => to !== TREASURY && inner.push(to, amount),
      balanceOf: (holder) => inner.balanceOf(holder),
    };
    const ledger = new ShareLedger(
      { vaultId: VAULT, owner: OWNER, fees: { depositFeeBps: 50 }, feeRecipient: TREASURY },
      { transfers: agent, authorizer: DEFAULT_AUTHORIZER },
    );

    expect(() => ledger.deposit("alice", 1_000n, "alice")).toThrow(code("TRANSFER_FAILED"));
    expect(book.balanceOf("alice")).toBe(1_000n);
    expect(book.balanceOf(VAULT)).toBe(0n);
    expect(ledger.balanceOf("alice")).toBe(0n);
    expect(ledger.totalShares).toBe(0n);
  });

  it("restores burned shares when the payout fails", () => {
    const book = new InMemoryTokenBook("USDC");
    book.credit("alice", 1_000n);
    const inner = book.agentFor(VAULT);
    const agent: TransferAgent = {
      pull: (from, amount) => inner.pull(from, amount),
      push: (to, amount) => to !== "blocked" && inner.push(to, amount),
      balanceOf: (holder) => inner.balanceOf(holder),
    };
    const ledger = new ShareLedger(
      { vaultId: VAULT, owner: OWNER },
      { transfers: agent, authorizer: DEFAULT_AUTHORIZER },
    );
    ledger.deposit("alice", 1_000n, "alice");

    expect(() => ledger.redeem("alice", 400n, "blocked", "alice")).toThrow(
      code("TRANSFER_FAILED"),
    );
    expect(ledger.balanceOf("alice")).toBe(1_000n);
    expect(ledger.totalShares).toBe(1_000n);
    expect(book.balanceOf(VAULT)).toBe(1_000n);
  });
});

// =============================================================================
// Share token
// =============================================================================

describe("ShareLedger share transfers", () => {
  let fx: VaultFixture;

  beforeEach(() => {
    fx = createVault();
    fx.book.credit("alice", 1_000n);
    fx.ledger.deposit("alice", 1_000n, "alice");
  });

  it("moves shares between holders", () => {
    fx.ledger.transferShares("alice", "bob", 400n);
    expect(fx.ledger.balanceOf("alice")).toBe(600n);
    expect(fx.ledger.balanceOf("bob")).toBe(400n);
    expect(fx.ledger.totalShares).toBe(1_000n);
  });

  it("rejects moving more than the sender holds", () => {
    expect(() => fx.ledger.transferShares("alice", "bob", 1_001n)).toThrow(
      code("INSUFFICIENT_BALANCE"),
    );
  });

  it("spends the allowance on delegated transfers", () => {
    expect(() => fx.ledger.transferSharesFrom("carol", "alice", "bob", 100n)).toThrow(
      code("INSUFFICIENT_ALLOWANCE"),
    );

    fx.ledger.approve("alice", "carol", 100n);
    fx.ledger.transferSharesFrom("carol", "alice", "bob", 100n);

    expect(fx.ledger.allowance("alice", "carol")).toBe(0n);
    expect(fx.ledger.holders()).toEqual([
      { holder: "alice", shares: 900n },
      { holder: "bob", shares: 100n },
    ]);
  });

  it("drops holders whose balance reaches zero", () => {
    fx.ledger.transferShares("alice", "bob", 1_000n);
    expect(fx.ledger.holders()).toEqual([{ holder: "bob", shares: 1_000n }]);
  });
});

// =============================================================================
// Routing
// =============================================================================

describe("ShareLedger fund routing", () => {
  let fx: VaultFixture;

  beforeEach(() => {
    fx = createVault({ minLiquidityReserve: 200n });
    fx.native.credit(VAULT, 1_000n);
  });

  it("executes calls that leave the reserve intact", () => {
    const plan = fx.ledger.routeFunds(AGENT, {
      destinations: ["dex"],
      payloads: ["0xswap"],
      values: [800n],
    });

    expect(plan.totalValue).toBe(800n);
    expect(plan.nativeBalance).toBe(1_000n);
    expect(plan.remaining).toBe(200n);
    expect(fx.native.balanceOf("dex")).toBe(800n);
    expect(fx.executor.executed).toEqual([
      { from: VAULT, calls: [{ destination: "dex", payload: "0xswap", value: 800n }] },
    ]);
  });

  it("rejects calls that would breach the reserve", () => {
    expect(() =>
      fx.ledger.routeFunds(AGENT, { destinations: ["dex"], payloads: ["0x"], values: [801n] }),
    ).toThrow(code("INSUFFICIENT_LIQUIDITY"));
    expect(fx.executor.executed).toHaveLength(0);
  });

  it("applies a raised reserve", () => {
    fx.ledger.setMinLiquidityReserve(OWNER, 500n);
    expect(() =>
      fx.ledger.routeFunds(AGENT, { destinations: ["dex"], payloads: ["0x"], values: [600n] }),
    ).toThrow(code("INSUFFICIENT_LIQUIDITY"));
    expect(() => fx.ledger.setMinLiquidityReserve(AGENT, 0n)).toThrow(
      code("UNAUTHORIZED_CALLER"),
    );
  });

  it("rejects mismatched call arrays", () => {
    expect(() =>
      fx.ledger.routeFunds(AGENT, {
        destinations: ["dex", "bridge"],
        payloads: ["0x"],
        values: [1n, 1n],
      }),
    ).toThrow(code("INVALID_EXECUTE_PARAMS"));
    expect(() =>
      fx.ledger.routeFunds(AGENT, { destinations: [], payloads: [], values: [] }),
    ).toThrow(code("INVALID_EXECUTE_PARAMS"));
  });

  it("only lets routing agents route", () => {
    expect(() =>
      fx.ledger.routeFunds(OWNER, { destinations: ["dex"], payloads: ["0x"], values: [1n] }),
    ).toThrow(code("UNAUTHORIZED_CALLER"));
  });

  it("is unavailable without an executor", () => {
    const book = new InMemoryTokenBook("USDC");
    const ledger = new ShareLedger(
      { vaultId: VAULT, owner: OWNER },
      { transfers: book.agentFor(VAULT), authorizer: DEFAULT_AUTHORIZER },
    );
    expect(() =>
      ledger.routeFunds(AGENT, { destinations: ["dex"], payloads: ["0x"], values: [1n] }),
    ).toThrow(code("ROUTING_UNAVAILABLE"));
  });
});

describe("ShareLedger strategies", () => {
  let fx: VaultFixture;

  beforeEach(() => {
    fx = createVault();
    fx.native.credit(VAULT, 1_000n);
    fx.ledger.registerStrategy(OWNER, { id: "lp", destination: "pool-a", description: "LP" });
  });

  it("routes value to a registered strategy", () => {
    const plan = fx.ledger.executeStrategy(AGENT, "lp", "0xdeposit", 300n);
    expect(plan.calls).toEqual([{ destination: "pool-a", payload: "0xdeposit", value: 300n }]);
    expect(fx.native.balanceOf("pool-a")).toBe(300n);
  });

  it("rejects duplicate and blank ids", () => {
    expect(() =>
      fx.ledger.registerStrategy(OWNER, { id: "lp", destination: "pool-b" }),
    ).toThrow(code("STRATEGY_EXISTS"));
    expect(() =>
      fx.ledger.registerStrategy(OWNER, { id: "  ", destination: "pool-b" }),
    ).toThrow(code("INVALID_STRATEGY_ID"));
  });

  it("rejects unknown strategies", () => {
    expect(() => fx.ledger.executeStrategy(AGENT, "nope", "0x", 1n)).toThrow(
      code("INVALID_STRATEGY_ID"),
    );
  });

  it("requires manage-strategies to register or remove", () => {
    expect(() =>
      fx.ledger.registerStrategy(AGENT, { id: "x", destination: "pool-x" }),
    ).toThrow(code("UNAUTHORIZED_CALLER"));
    expect(() => fx.ledger.removeStrategy(AGENT, "lp")).toThrow(code("UNAUTHORIZED_CALLER"));
  });

  it("removes a strategy", () => {
    const removed = fx.ledger.removeStrategy(OWNER, "lp");
    expect(removed.destination).toBe("pool-a");
    expect(fx.ledger.listStrategies()).toEqual([]);
    expect(fx.ledger.getStrategy("lp")).toBeUndefined();
  });
});

// =============================================================================
// Fees and administration
// =============================================================================

describe("ShareLedger performance fee", () => {
  it("charges the whole custodied balance on every collection", () => {
    const { book, ledger } = createVault({
      fees: { performanceFeeBps: 1_000 },
      feeRecipient: TREASURY,
    });
    book.credit("alice", 1_000n);
    ledger.deposit("alice", 1_000n, "alice");

    expect(ledger.collectPerformanceFee(OWNER)).toEqual({
      base: 1_000n,
      fee: 100n,
      transferred: true,
    });
    expect(ledger.collectPerformanceFee(OWNER)).toEqual({
      base: 900n,
      fee: 90n,
      transferred: true,
    });
    expect(book.balanceOf(TREASURY)).toBe(190n);
  });

  it("moves nothing without a recipient", () => {
    const { book, ledger } = createVault({ fees: { performanceFeeBps: 1_000 } });
    book.credit("alice", 1_000n);
    ledger.deposit("alice", 1_000n, "alice");

    expect(ledger.collectPerformanceFee(OWNER)).toEqual({
      base: 1_000n,
      fee: 0n,
      transferred: false,
    });
    expect(ledger.totalAssets()).toBe(1_000n);
  });

  it("requires collect-fees", () => {
    const { ledger } = createVault();
    expect(() => ledger.collectPerformanceFee(AGENT)).toThrow(code("UNAUTHORIZED_CALLER"));
  });
});

describe("ShareLedger administration", () => {
  it("updates fees within their ceilings", () => {
    const { ledger } = createVault();
    ledger.setDepositFee(OWNER, 75);
    ledger.setWithdrawalFee(OWNER, 1_000);
    ledger.setPerformanceFee(OWNER, 3_000);
    expect(ledger.fees).toEqual({
      depositFeeBps: 75,
      withdrawalFeeBps: 1_000,
      performanceFeeBps: 3_000,
    });
  });

  it("leaves fees unchanged when a rate is too high", () => {
    const { ledger } = createVault({ fees: { depositFeeBps: 10 } });
    expect(() => ledger.setDepositFee(OWNER, 1_001)).toThrow(code("FEE_TOO_HIGH"));
    expect(() => ledger.setPerformanceFee(OWNER, 3_001)).toThrow(code("FEE_TOO_HIGH"));
    expect(ledger.fees.depositFeeBps).toBe(10);
  });

  it("rejects fee changes from callers without manage-fees", () => {
    const { ledger } = createVault();
    expect(() => ledger.setDepositFee(AGENT, 10)).toThrow(code("UNAUTHORIZED_CALLER"));
    expect(() => ledger.setFeeRecipient(AGENT, TREASURY)).toThrow(code("UNAUTHORIZED_CALLER"));
  });

  it("rejects the null fee recipient", () => {
    const { ledger } = createVault();
    expect(() => ledger.setFeeRecipient(OWNER, "")).toThrow(code("INVALID_FEE_RECIPIENT"));
    expect(ledger.setFeeRecipient(OWNER, TREASURY)).toBe(TREASURY);
    expect(ledger.feeRecipient).toBe(TREASURY);
  });

  it("rejects fees above their ceiling at construction", () => {
    expect(() => createVault({ fees: { withdrawalFeeBps: 2_000 } })).toThrow(
      code("FEE_TOO_HIGH"),
    );
  });

  it("transfers ownership", () => {
    const { ledger } = createVault();
    expect(ledger.transferOwnership(OWNER, "new-owner")).toBe(OWNER);
    expect(ledger.owner).toBe("new-owner");
    expect(() => ledger.transferOwnership(OWNER, "")).toThrow(code("INVALID_ACCOUNT"));
  });
});
