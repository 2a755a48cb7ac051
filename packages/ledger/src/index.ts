/**
 * @keel/ledger — Accounting primitives shared by the Keel ledgers.
 *
 * - Fixed-point bigint math with explicit rounding
 * - A reentrancy guard shared by every mutating entry point
 * - Atomic execution: state capture, transfer journaling, rollback
 * - Clocks and an in-process token book
 *
 * Design rules:
 * - No floating point
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Zero runtime dependencies
 */

// Math
export {
  BPS_DENOMINATOR,
  assertAmount,
  assertBps,
  mulDiv,
  bpsOf,
  sumAmounts,
  parseAmount,
  formatAmount,
  toMoney,
} from "./money-math.js";
export type { RoundingMode } from "./money-math.js";

// Guard + atomic execution
export { ReentrancyGuard } from "./guard.js";
export { TransferSession, runAtomically } from "./atomic.js";
export type { AtomicContext } from "./atomic.js";

// In-process token
export { InMemoryTokenBook } from "./token-book.js";

// Clocks
export {
  SECONDS_PER_DAY,
  assertTimestamp,
  SystemClock,
  ManualClock,
} from "./clock.js";

// Errors
export { LedgerError } from "./types.js";
export type { LedgerErrorCode } from "./types.js";
