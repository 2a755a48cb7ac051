/**
 * Authentication and authorization types.
 *
 * Callers authenticate with an API key (X-Api-Key). Each key maps to
 * a role and to the ledger account the caller acts as.
 *
 * Two layers of access control:
 * 1. Permissions gate routes (read / write / admin)
 * 2. Capabilities gate privileged ledger operations; the ledgers
 *    check them through the Authorizer
 */

import { CAPABILITIES } from "@keel/types";
import type { AccountId, Capability } from "@keel/types";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "viewer" | "depositor" | "agent" | "admin";

export const ROLES: readonly Role[] = ["viewer", "depositor", "agent", "admin"];

/** Permission levels for route access */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  depositor: ["read", "write"],
  agent: ["read", "write"],
  admin: ["read", "write", "admin"],
};

/** Ledger capabilities each role holds */
export const ROLE_CAPABILITIES: Record<Role, readonly Capability[]> = {
  viewer: [],
  depositor: [],
  agent: ["route-funds"],
  admin: CAPABILITIES,
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

export function parseRole(value: string): Role | undefined {
  return ROLES.find((role) => role === value);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set on every /api request.
 */
export interface AuthContext {
  readonly type: "api-key" | "unsecured";
  readonly identity: string;
  readonly role: Role;
  /** Ledger account the caller acts as */
  readonly account: AccountId;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly account: AccountId;
}
