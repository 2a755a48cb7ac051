/**
 * Atomic execution.
 *
 * Runs a ledger operation all-or-nothing:
 * 1. Acquire the ledger's reentrancy guard
 * 2. Capture the ledger's internal state
 * 3. Journal every transfer the operation issues
 * 4. On any error: restore the state, compensate journaled transfers
 *    in reverse order, rethrow the original error
 *
 * Transfers that return false abort the operation with TRANSFER_FAILED.
 */

import type { AccountId, TransferAgent } from "@keel/types";
import type { ReentrancyGuard } from "./guard.js";
import { assertAmount } from "./money-math.js";
import { LedgerError } from "./types.js";

// =============================================================================
// Transfer session
// =============================================================================

interface JournalEntry {
  readonly kind: "pull" | "push";
  readonly account: AccountId;
  readonly amount: bigint;
}

/**
 * Transfer agent wrapper used inside one atomic operation.
 * Throws instead of returning false, and remembers what it moved.
 */
export class TransferSession {
  private readonly _agent: TransferAgent;
  private readonly _journal: JournalEntry[] = [];

  constructor(agent: TransferAgent) {
    this._agent = agent;
  }

  pull(from: AccountId, amount: bigint): void {
    assertAmount(amount);
    if (amount === 0n) return;
    if (!this._agent.pull(from, amount)) {
      throw new LedgerError("TRANSFER_FAILED", `Pull of ${amount.toString()} from '${from}' failed`, {
        details: { from, amount: amount.toString() },
      });
    }
    this._journal.push({ kind: "pull", account: from, amount });
  }

  push(to: AccountId, amount: bigint): void {
    assertAmount(amount);
    if (amount === 0n) return;
    if (!this._agent.push(to, amount)) {
      throw new LedgerError("TRANSFER_FAILED", `Push of ${amount.toString()} to '${to}' failed`, {
        details: { to, amount: amount.toString() },
      });
    }
    this._journal.push({ kind: "push", account: to, amount });
  }

  balanceOf(holder: AccountId): bigint {
    return this._agent.balanceOf(holder);
  }

  /** Number of transfers committed so far. */
  get transferCount(): number {
    return this._journal.length;
  }

  /**
   * Reverse every journaled transfer, newest first.
   * Returns the entries that could not be reversed.
   */
  unwind(): readonly JournalEntry[] {
    const stuck: JournalEntry[] = [];
    for (let i = this._journal.length - 1; i >= 0; i--) {
      const entry = this._journal[i];
      if (entry === undefined) continue;
      const reversed = entry.kind === "pull"
        ? this._agent.push(entry.account, entry.amount)
        : this._agent.pull(entry.account, entry.amount);
      if (!reversed) {
        stuck.push(entry);
      }
    }
    this._journal.length = 0;
    return stuck;
  }
}

// =============================================================================
// Atomic runner
// =============================================================================

/**
 * What a ledger hands to `runAtomically` so its state can be
 * captured and restored around an operation.
 */
export interface AtomicContext<S> {
  readonly guard: ReentrancyGuard;
  readonly transfers: TransferAgent;
  capture(): S;
  restore(state: S): void;
}

/**
 * Execute `body` all-or-nothing under the context's guard.
 */
export function runAtomically<S, T>(
  ctx: AtomicContext<S>,
  operation: string,
  body: (transfers: TransferSession) => T,
): T {
  return ctx.guard.run(operation, () => {
    const saved = ctx.capture();
    const session = new TransferSession(ctx.transfers);

    try {
      return body(session);
    } catch (err) {
      ctx.restore(saved);
      const stuck = session.unwind();
      if (stuck.length > 0) {
        throw new LedgerError(
          "ROLLBACK_FAILED",
          `'${operation}' failed and ${String(stuck.length)} transfer(s) could not be reversed`,
          {
            cause: err,
            details: {
              operation,
              stuck: stuck.map((e) => ({ ...e, amount: e.amount.toString() })),
            },
          },
        );
      }
      throw err;
    }
  });
}
