/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (both ledgers constructed)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { KeelService } from "../services/keel-service.js";

export function createHealthRoutes(service: KeelService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const body = {
      vault: service.vault.vaultId,
      pool: service.pool.poolId,
      timestamp: new Date().toISOString(),
    };
    if (!service.isReady()) {
      return c.json({ status: "not_ready", ...body }, 503);
    }
    return c.json({ status: "ready", ...body });
  });

  return routes;
}
