/**
 * @keel/vault — Single-asset share vault.
 *
 * Issues proportional ownership shares for deposits of one underlying
 * asset, charges basis-point fees, and lets a privileged agent route
 * vault-held native value to external calls.
 *
 * Design rules:
 * - Pricing always rounds in the vault's favour
 * - Custodied assets come from the transfer agent, never from storage
 * - Every mutation is atomic and non-reentrant
 * - All state is snapshot-able and restorable
 */

export { ShareLedger } from "./share-ledger.js";

// Pure helpers
export {
  convertToShares,
  convertToAssets,
  previewDeposit,
  previewWithdraw,
  previewRedeem,
} from "./share-math.js";
export type { VaultTotals } from "./share-math.js";
export { assertFee, resolveFees, splitFee } from "./fees.js";
export type { FeeKind } from "./fees.js";
export { planRoute } from "./routing.js";
export type { RouteRequest } from "./routing.js";

// Types
export { FEE_CEILINGS, ZERO_FEES, VaultError } from "./types.js";
export type {
  FeeSchedule,
  ShareLedgerConfig,
  ShareLedgerDeps,
  DepositReceipt,
  WithdrawReceipt,
  Quote,
  PerformanceFeeReceipt,
  Strategy,
  RoutePlan,
  ShareLedgerSnapshot,
  VaultErrorCode,
} from "./types.js";
