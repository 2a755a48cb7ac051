/**
 * InMemoryTokenBook — a single fungible token kept in process.
 *
 * Serves as the transfer collaborator for a custodian (vault or
 * pool) via `agentFor()`, and as the native-value book behind a
 * call executor. Transfers are all-or-nothing: an overdraft
 * returns false and moves nothing.
 */

import type { AccountId, TransferAgent } from "@keel/types";
import { isAccountId } from "@keel/types";
import { assertAmount } from "./money-math.js";
import { LedgerError } from "./types.js";

export class InMemoryTokenBook {
  readonly symbol: string;
  private readonly _balances = new Map<AccountId, bigint>();
  private _supply = 0n;

  constructor(symbol: string) {
    this.symbol = symbol;
  }

  balanceOf(holder: AccountId): bigint {
    return this._balances.get(holder) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._supply;
  }

  /**
   * Create new units for a holder (faucet / bridge-in).
   */
  credit(holder: AccountId, amount: bigint): bigint {
    if (!isAccountId(holder)) {
      throw new LedgerError("INVALID_ACCOUNT", "Cannot credit the null account");
    }
    assertAmount(amount);
    const next = this.balanceOf(holder) + amount;
    this._balances.set(holder, next);
    this._supply += amount;
    return next;
  }

  /**
   * Move units between holders. Returns false on overdraft,
   * zero-or-negative amounts, or a null party.
   */
  transfer(from: AccountId, to: AccountId, amount: bigint): boolean {
    if (amount <= 0n || !isAccountId(from) || !isAccountId(to)) {
      return false;
    }
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      return false;
    }
    this._balances.set(from, fromBalance - amount);
    this._balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  /**
   * All non-zero balances, sorted by holder for stable output.
   */
  holders(): readonly { holder: AccountId; balance: bigint }[] {
    return [...this._balances.entries()]
      .filter(([, balance]) => balance > 0n)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([holder, balance]) => ({ holder, balance }));
  }

  /**
   * A transfer agent bound to `custodian`.
   */
  agentFor(custodian: AccountId): TransferAgent {
    return {
      pull: (from, amount) => this.transfer(from, custodian, amount),
      push: (to, amount) => this.transfer(custodian, to, amount),
      balanceOf: (holder) => this.balanceOf(holder),
    };
  }
}
