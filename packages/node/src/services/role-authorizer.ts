/**
 * Role-based Authorizer for the ledgers.
 *
 * Resolves an account to a role and grants the capabilities that
 * role holds. The account `ownerOf` returns holds the admin role for
 * as long as it owns the vault. Other accounts without a role fall
 * back to `fallbackRole`, or hold nothing when none is set.
 */

import type { AccountId, Authorizer, Capability } from "@keel/types";
import { ROLE_CAPABILITIES } from "../types/auth.js";
import type { Role } from "../types/auth.js";

export class RoleAuthorizer implements Authorizer {
  private readonly _roles: ReadonlyMap<AccountId, Role>;
  private readonly _fallbackRole: Role | undefined;
  private readonly _ownerOf: (() => AccountId | undefined) | undefined;

  constructor(
    roles: ReadonlyMap<AccountId, Role>,
    fallbackRole?: Role,
    ownerOf?: () => AccountId | undefined,
  ) {
    this._roles = roles;
    this._fallbackRole = fallbackRole;
    this._ownerOf = ownerOf;
  }

  roleOf(account: AccountId): Role | undefined {
    if (this._ownerOf !== undefined && this._ownerOf() === account) {
      return "admin";
    }
    return this._roles.get(account) ?? this._fallbackRole;
  }

  isAuthorized(caller: AccountId, capability: Capability): boolean {
    const role = this.roleOf(caller);
    return role !== undefined && ROLE_CAPABILITIES[role].includes(capability);
  }
}
