/**
 * Identity Types
 *
 * Every party the ledgers see (holders, receivers, fee recipients,
 * strategy destinations, the vault and the pool themselves) is an
 * opaque, non-empty string identity.
 *
 * Rules:
 * - The empty string is the null identity and never a valid account
 * - Identities carry no semantics; meaning lives in consuming code
 */

/** Opaque account identity (wallet address, user id, contract id). */
export type AccountId = string;

/** The null identity. Rejected wherever a real account is required. */
export const NULL_ACCOUNT: AccountId = "";

/**
 * Privileged operations the ledgers gate behind the authorizer.
 *
 * - manage-fees: change fee rates and the fee recipient
 * - manage-rates: change the lending pool's annual rate
 * - manage-reserve: change the vault's minimum liquidity reserve
 * - route-funds: route vault-held funds to external calls
 * - manage-strategies: register or remove strategy destinations
 * - collect-fees: charge the performance fee
 * - transfer-ownership: hand the vault to a new owner
 */
export type Capability =
  | "manage-fees"
  | "manage-rates"
  | "manage-reserve"
  | "route-funds"
  | "manage-strategies"
  | "collect-fees"
  | "transfer-ownership";

export const CAPABILITIES: readonly Capability[] = [
  "manage-fees",
  "manage-rates",
  "manage-reserve",
  "route-funds",
  "manage-strategies",
  "collect-fees",
  "transfer-ownership",
] as const;
