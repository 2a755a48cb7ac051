/**
 * Shared fixtures for ShareLedger tests.
 */

import { InMemoryTokenBook } from "@keel/ledger";
import type {
  AccountId,
  Authorizer,
  CallExecutor,
  Capability,
  ExternalCall,
} from "@keel/types";
import { ShareLedger } from "../src/share-ledger.js";
import type { ShareLedgerConfig } from "../src/types.js";

export const VAULT = "vault-1";
export const OWNER = "owner";
export const AGENT = "agent";
export const TREASURY = "treasury";

/** Grants a fixed capability list per caller. */
export class StaticAuthorizer implements Authorizer {
  private readonly _grants: ReadonlyMap<AccountId, readonly Capability[]>;

  constructor(grants: Record<AccountId, readonly Capability[]>) {
    this._grants = new Map(Object.entries(grants));
  }

  isAuthorized(caller: AccountId, capability: Capability): boolean {
    return this._grants.get(caller)?.includes(capability) ?? false;
  }
}

/** Moves native value on an in-memory book, all or nothing, and records each batch. */
export class RecordingExecutor implements CallExecutor {
  readonly executed: { from: AccountId; calls: readonly ExternalCall[] }[] = [];
  readonly native: InMemoryTokenBook;

  constructor(native: InMemoryTokenBook) {
    this.native = native;
  }

  nativeBalanceOf(holder: AccountId): bigint {
    return this.native.balanceOf(holder);
  }

  execute(from: AccountId, calls: readonly ExternalCall[]): void {
    const total = calls.reduce((acc, call) => acc + call.value, 0n);
    if (total > this.native.balanceOf(from)) {
      throw new Error(`batch of ${total.toString()} exceeds the balance of ${from}`);
    }
    for (const call of calls) {
      if (call.value > 0n) {
        this.native.transfer(from, call.destination, call.value);
      }
    }
    this.executed.push({ from, calls });
  }
}

export const DEFAULT_AUTHORIZER = new StaticAuthorizer({
  [OWNER]: [
    "manage-fees",
    "manage-reserve",
    "manage-strategies",
    "collect-fees",
    "transfer-ownership",
  ],
  [AGENT]: ["route-funds"],
});

export interface VaultFixture {
  readonly book: InMemoryTokenBook;
  readonly native: InMemoryTokenBook;
  readonly executor: RecordingExecutor;
  readonly ledger: ShareLedger;
}

export function createVault(config: Partial<ShareLedgerConfig> = {}): VaultFixture {
  const book = new InMemoryTokenBook("USDC");
  const native = new InMemoryTokenBook("ETH");
  const executor = new RecordingExecutor(native);
  const ledger = new ShareLedger(
    { vaultId: VAULT, owner: OWNER, ...config },
    { transfers: book.agentFor(VAULT), authorizer: DEFAULT_AUTHORIZER, executor },
  );
  return { book, native, executor, ledger };
}
