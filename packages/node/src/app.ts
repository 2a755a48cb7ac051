/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AccountId, Clock } from "@keel/types";
import type { AppEnv } from "./types/api-contract.js";
import type { Role } from "./types/auth.js";
import { KeelService } from "./services/keel-service.js";
import type { KeelServiceConfig } from "./services/keel-service.js";
import { RoleAuthorizer } from "./services/role-authorizer.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import { authMiddleware, unsecuredCallerMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vault.js";
import { createLendingRoutes } from "./routes/lending.js";
import { createBalanceRoutes } from "./routes/balances.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: KeelServiceConfig;
  /** Ledger operation logger. Default: silent */
  readonly logger?: Logger;
  readonly logFn?: (entry: RequestLogEntry) => void;
  readonly idempotencyTtlMs?: number;
  /** Auth configuration. When provided, API keys are required on /api. */
  readonly auth?: AuthConfig;
  /** Unsecured mode: roles by account. The vault owner is always admin. */
  readonly roles?: ReadonlyMap<AccountId, Role>;
  /** Unsecured mode: role of accounts missing from `roles`. Default: depositor */
  readonly defaultRole?: Role;
  readonly clock?: Clock;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: KeelService;
  readonly idempotencyStore: InMemoryIdempotencyStore;
}

function rolesFromKeys(auth: AuthConfig): Map<AccountId, Role> {
  const roles = new Map<AccountId, Role>();
  for (const record of auth.apiKeys.values()) {
    roles.set(record.account, record.role);
  }
  return roles;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const roles =
    options.auth !== undefined
      ? rolesFromKeys(options.auth)
      : new Map<AccountId, Role>(options.roles ?? []);

  // Admin follows the vault's current owner, so ownership transfers move it.
  let service: KeelService | undefined;
  const ownerOf = (): AccountId => service?.vault.owner ?? options.serviceConfig.vault.owner;
  const authorizer =
    options.auth !== undefined
      ? new RoleAuthorizer(roles, undefined, ownerOf)
      : new RoleAuthorizer(roles, options.defaultRole ?? "depositor", ownerOf);

  service = new KeelService(options.serviceConfig, {
    authorizer,
    logger: options.logger ?? pino({ level: "silent" }),
    clock: options.clock,
  });
  const idempotencyStore = new InMemoryIdempotencyStore(
    options.idempotencyTtlMs ?? 86400000,
  );

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use(
      "/api/*",
      authMiddleware(options.auth, (account) => (account === ownerOf() ? "admin" : undefined)),
    );
  } else {
    // Unsecured mode (tests, dev): X-Caller-Id names the account
    app.use("/api/*", unsecuredCallerMiddleware((account) => authorizer.roleOf(account)));
  }

  // Idempotency for POST /api/* requests
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  // Mount v1 API routes
  app.route("/api/v1/vault", createVaultRoutes(service));
  app.route("/api/v1/pool", createLendingRoutes(service));
  app.route("/api/v1/balances", createBalanceRoutes(service));

  return { app, service, idempotencyStore };
}
