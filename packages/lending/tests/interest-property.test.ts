/**
 * Property-based tests for interest accrual.
 *
 * Invariants:
 * 1. Splitting an interval loses at most one unit to rounding
 * 2. Accruing at the same instant twice is a no-op
 * 3. Depositing and withdrawing at the same instant returns exactly
 *    the principal
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryTokenBook, ManualClock } from "@keel/ledger";
import type { Authorizer } from "@keel/types";
import { InterestAccrualLedger } from "../src/accrual-ledger.js";
import { SECONDS_PER_YEAR, computeInterest } from "../src/interest.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbPrincipal = fc.bigInt({ min: 1n, max: 10n ** 18n });
const arbRate = fc.integer({ min: 0, max: 10_000 });
const arbElapsed = fc.integer({ min: 1, max: 2 * SECONDS_PER_YEAR });

const denyAll: Authorizer = { isAuthorized: () => false };

function createPool(rate: number) {
  const book = new InMemoryTokenBook("USDC");
  const clock = new ManualClock(1_000);
  const pool = new InterestAccrualLedger(
    { poolId: "pool", annualRateBps: rate },
    { transfers: book.agentFor("pool"), authorizer: denyAll, clock },
  );
  return { book, clock, pool };
}

// =============================================================================
// Tests
// =============================================================================

describe("interest property tests", () => {
  it("is linear in elapsed time within one unit of rounding", () => {
    fc.assert(
      fc.property(arbPrincipal, arbRate, arbElapsed, arbElapsed, (principal, rate, t1, t2) => {
        const split = computeInterest(principal, rate, t1) + computeInterest(principal, rate, t2);
        const whole = computeInterest(principal, rate, t1 + t2);
        expect(whole - split).toBeGreaterThanOrEqual(0n);
        expect(whole - split).toBeLessThanOrEqual(1n);
      }),
      { numRuns: 200 },
    );
  });

  it("two-step ledger accrual tracks the single-interval formula", () => {
    fc.assert(
      fc.property(arbPrincipal, arbRate, arbElapsed, arbElapsed, (principal, rate, t1, t2) => {
        const { book, clock, pool } = createPool(rate);
        book.credit("alice", principal);
        pool.deposit("alice", principal);

        clock.advance(t1);
        pool.accrue("alice");
        clock.advance(t2);
        pool.accrue("alice");

        const expected = computeInterest(principal, rate, t1 + t2);
        const drift = expected - pool.accruedInterestOf("alice");
        expect(drift).toBeGreaterThanOrEqual(0n);
        expect(drift).toBeLessThanOrEqual(1n);
      }),
      { numRuns: 100 },
    );
  });

  it("accrual at an unchanged instant adds nothing", () => {
    fc.assert(
      fc.property(arbPrincipal, arbRate, arbElapsed, (principal, rate, elapsed) => {
        const { book, clock, pool } = createPool(rate);
        book.credit("alice", principal);
        pool.deposit("alice", principal);
        clock.advance(elapsed);

        const first = pool.accrue("alice");
        const second = pool.accrue("alice");
        expect(second.interestDelta).toBe(0n);
        expect(second.accruedInterest).toBe(first.accruedInterest);
      }),
      { numRuns: 100 },
    );
  });

  it("same-instant deposit and withdrawal conserve the principal", () => {
    fc.assert(
      fc.property(arbPrincipal, arbRate, (principal, rate) => {
        const { book, pool } = createPool(rate);
        book.credit("alice", principal);
        pool.deposit("alice", principal);
        const receipt = pool.withdraw("alice", principal);

        expect(receipt.interest).toBe(0n);
        expect(book.balanceOf("alice")).toBe(principal);
        expect(pool.totalPrincipal).toBe(0n);
      }),
      { numRuns: 100 },
    );
  });
});
