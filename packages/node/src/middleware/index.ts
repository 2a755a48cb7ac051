/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readBody, readQuery } from "./validate.js";
export {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
  IDEMPOTENCY_HEADER,
  REPLAY_HEADER,
} from "./idempotency.js";
export type { IdempotencyStore, CachedResponse, ResponseToCache } from "./idempotency.js";
export {
  authMiddleware,
  unsecuredCallerMiddleware,
  requirePermission,
  API_KEY_HEADER,
  CALLER_HEADER,
  ANONYMOUS_CALLER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
