/**
 * Authentication middleware.
 *
 * Secured mode: X-Api-Key is looked up in the configured key registry
 * and resolves to a role and the account the caller acts as.
 *
 * Unsecured mode (tests, local development): the caller names its
 * account in X-Caller-Id and gets that account's role, if it has one.
 *
 * Either way `c.set("auth", authContext)` runs before any route.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission, Role } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller-Id";
export const ANONYMOUS_CALLER = "anonymous";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Require a valid X-Api-Key. Returns 401 when it is missing or unknown.
 *
 * `roleOf` may override the key's role for an account, such as the
 * admin role held by the current vault owner.
 */
export function authMiddleware(
  config: AuthConfig,
  roleOf?: (account: string) => Role | undefined,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    c.set("auth", {
      type: "api-key",
      identity: record.key,
      role: roleOf?.(record.account) ?? record.role,
      account: record.account,
    });
    return next();
  };
}

/**
 * Trust the X-Caller-Id header. Callers without a known role are viewers.
 */
export function unsecuredCallerMiddleware(
  roleOf: (account: string) => Role | undefined,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const account = c.req.header(CALLER_HEADER)?.trim() || ANONYMOUS_CALLER;
    c.set("auth", {
      type: "unsecured",
      identity: account,
      role: roleOf(account) ?? "viewer",
      account,
    });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Returns 403 if the caller's role lacks the required permission.
 * Must run after one of the middlewares above.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
