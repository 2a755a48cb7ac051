/**
 * In-process CallExecutor.
 *
 * Routed calls move native value on an in-memory book and are kept
 * as a dispatch log. Payloads are opaque and only recorded.
 */

import { InMemoryTokenBook, LedgerError, sumAmounts } from "@keel/ledger";
import type { AccountId, CallExecutor, ExternalCall } from "@keel/types";

export interface DispatchedCall extends ExternalCall {
  readonly from: AccountId;
  readonly dispatchedAt: string;
}

export class BookCallExecutor implements CallExecutor {
  readonly native: InMemoryTokenBook;
  private readonly _dispatched: DispatchedCall[] = [];

  constructor(native: InMemoryTokenBook) {
    this.native = native;
  }

  nativeBalanceOf(holder: AccountId): bigint {
    return this.native.balanceOf(holder);
  }

  /**
   * Execute a batch. The whole batch is checked against the sender's
   * balance before any value moves.
   */
  execute(from: AccountId, calls: readonly ExternalCall[]): void {
    const total = sumAmounts(
      calls.map((call) => call.value),
      "value",
    );
    const balance = this.native.balanceOf(from);
    if (total > balance) {
      throw new LedgerError(
        "TRANSFER_FAILED",
        `Batch of ${total.toString()} exceeds native balance ${balance.toString()} of '${from}'`,
      );
    }

    const dispatchedAt = new Date().toISOString();
    for (const call of calls) {
      if (call.value > 0n) {
        this.native.transfer(from, call.destination, call.value);
      }
      this._dispatched.push({ ...call, from, dispatchedAt });
    }
  }

  dispatched(): readonly DispatchedCall[] {
    return [...this._dispatched];
  }
}
