/**
 * @keel/types — Shared types for the Keel stack.
 *
 * - Account identities and capabilities
 * - Collaborator contracts (authorizer, transfer agent, clock, call executor)
 * - Financial primitives
 *
 * Design rules:
 * - All types are readonly
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

export type { AccountId, Capability } from "./identity.js";
export { NULL_ACCOUNT, CAPABILITIES } from "./identity.js";

export type {
  Authorizer,
  TransferAgent,
  Clock,
  ExternalCall,
  CallExecutor,
} from "./collaborators.js";

export type { Currency, Money, Bps, AmountString } from "./financial.js";

export {
  isAccountId,
  isCapability,
  isAmountString,
  isBps,
  isMoney,
} from "./guards.js";
