/**
 * @keel/ledger — Error type for the shared accounting primitives.
 *
 * Rules:
 * - Always thrown, never returned as a code
 * - Fail-closed: invalid input throws, never silently succeeds
 */

/** Error codes for the shared primitives. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT"
  | "INVALID_BPS"
  | "DIVISION_BY_ZERO"
  | "REENTRANT_CALL"
  | "TRANSFER_FAILED"
  | "ROLLBACK_FAILED"
  | "INVALID_TIMESTAMP";

/**
 * Structured error from the accounting primitives.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details?: Record<string, unknown> | undefined;

  constructor(
    code: LedgerErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LedgerError";
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}
