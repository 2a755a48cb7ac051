/**
 * Reentrancy guard.
 *
 * One guard per ledger instance, shared by every mutating entry point.
 * A collaborator that calls back into the same ledger while an
 * operation is in flight is rejected, whichever entry point it uses.
 */

import { LedgerError } from "./types.js";

export class ReentrancyGuard {
  private _operation: string | undefined;

  /** Whether an operation currently holds the guard. */
  get entered(): boolean {
    return this._operation !== undefined;
  }

  /**
   * Run `fn` while holding the guard. The guard is released on every
   * exit path, including throws.
   */
  run<T>(operation: string, fn: () => T): T {
    if (this._operation !== undefined) {
      throw new LedgerError(
        "REENTRANT_CALL",
        `Reentrant call to '${operation}' rejected while '${this._operation}' is in flight`,
        { details: { operation, inFlight: this._operation } },
      );
    }

    this._operation = operation;
    try {
      return fn();
    } finally {
      this._operation = undefined;
    }
  }
}
