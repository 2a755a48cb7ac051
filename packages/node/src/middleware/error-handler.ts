/**
 * Global error handler.
 *
 * Catches every error thrown by route handlers and answers with the
 * error envelope. Domain errors carry a `code`; the code picks the
 * HTTP status. Anything without a known code is a 500 whose message
 * is not exposed.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 422 | 500 | 503;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Request errors
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,

  // Shared primitives
  INVALID_AMOUNT: 400,
  INVALID_ACCOUNT: 400,
  INVALID_BPS: 400,
  INVALID_TIMESTAMP: 400,
  REENTRANT_CALL: 409,
  TRANSFER_FAILED: 422,

  // Vault
  ZERO_AMOUNT: 400,
  ZERO_SHARES: 422,
  ZERO_ASSETS: 422,
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  INSUFFICIENT_LIQUIDITY: 422,
  INVALID_EXECUTE_PARAMS: 400,
  FEE_TOO_HIGH: 400,
  INVALID_FEE_RECIPIENT: 400,
  UNAUTHORIZED_CALLER: 403,
  INVALID_STRATEGY_ID: 404,
  STRATEGY_EXISTS: 409,
  ROUTING_UNAVAILABLE: 503,
  INVALID_SNAPSHOT: 400,

  // Lending
  RATE_TOO_HIGH: 400,
};

interface CodedError extends Error {
  readonly code: string;
  readonly details?: unknown;
}

function hasCode(err: Error): err is CodedError {
  return "code" in err && typeof err.code === "string";
}

function detailsOf(err: CodedError): Record<string, unknown> | undefined {
  const { details } = err;
  if (typeof details === "object" && details !== null && !Array.isArray(details)) {
    return Object.fromEntries(Object.entries(details));
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  if (!hasCode(err)) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const status = STATUS_MAP[err.code] ?? 500;
  if (status === 500) {
    return c.json(createErrorEnvelope(err.code, "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(err.code, err.message, detailsOf(err)), status);
}
