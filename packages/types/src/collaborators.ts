/**
 * Collaborator Contracts
 *
 * The ledgers own arithmetic and bookkeeping only. Authorization,
 * token movement, time and external call execution are supplied by
 * the composing process through these interfaces.
 *
 * Rules:
 * - Every collaborator call is synchronous and atomic
 * - A failed transfer (false) aborts the whole enclosing operation
 * - Authorization is a pure predicate, consulted before mutation
 */

import type { AccountId, Capability } from "./identity.js";

/**
 * Capability check. Role storage lives behind this interface;
 * the ledgers never implement it.
 */
export interface Authorizer {
  isAuthorized(caller: AccountId, capability: Capability): boolean;
}

/**
 * Movement of the underlying asset, bound to one custodian
 * (the vault or the pool).
 *
 * - pull: move `amount` from `from` into the custodian
 * - push: move `amount` from the custodian to `to`
 * - balanceOf: asset balance of any holder
 */
export interface TransferAgent {
  pull(from: AccountId, amount: bigint): boolean;
  push(to: AccountId, amount: bigint): boolean;
  balanceOf(holder: AccountId): bigint;
}

/**
 * Time source in whole Unix seconds. Must never go backwards.
 */
export interface Clock {
  now(): number;
}

/**
 * One outbound call routed with vault-held native value.
 */
export interface ExternalCall {
  readonly destination: AccountId;
  /** Opaque call payload, hex or any encoding the executor understands */
  readonly payload: string;
  readonly value: bigint;
}

/**
 * Executes routed calls on behalf of a custodian. Success and failure
 * propagation belong to the executor: it throws to abort.
 *
 * Value the executor moves is not journaled by the ledger, so a failed
 * batch is not compensated. An executor must either move nothing when
 * it throws or guarantee the whole batch before moving any value.
 */
export interface CallExecutor {
  nativeBalanceOf(holder: AccountId): bigint;
  execute(from: AccountId, calls: readonly ExternalCall[]): void;
}
