/**
 * @keel/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, running in unsecured mode");
  }

  const { app } = createApp({
    serviceConfig: {
      asset: { symbol: config.ASSET_SYMBOL, decimals: config.ASSET_DECIMALS },
      vault: {
        vaultId: config.VAULT_ID,
        owner: config.VAULT_OWNER,
        fees: {
          depositFeeBps: config.DEPOSIT_FEE_BPS,
          withdrawalFeeBps: config.WITHDRAWAL_FEE_BPS,
          performanceFeeBps: config.PERFORMANCE_FEE_BPS,
        },
        feeRecipient: config.FEE_RECIPIENT,
        minLiquidityReserve: config.MIN_LIQUIDITY_RESERVE,
      },
      pool: {
        poolId: config.POOL_ID,
        annualRateBps: config.LENDING_RATE_BPS,
      },
    },
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    ...(authConfig !== undefined ? { auth: authConfig } : {}),
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, vault: config.VAULT_ID, pool: config.POOL_ID },
    "Keel node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
