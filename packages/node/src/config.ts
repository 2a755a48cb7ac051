/**
 * @keel/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { parseRole } from "./types/auth.js";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Vault
  VAULT_ID: z.string().min(1).default("vault"),
  VAULT_OWNER: z.string().min(1).default("admin"),
  ASSET_SYMBOL: z.string().min(1).default("USDC"),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),
  DEPOSIT_FEE_BPS: z.coerce.number().int().min(0).max(1000).default(0),
  WITHDRAWAL_FEE_BPS: z.coerce.number().int().min(0).max(1000).default(0),
  PERFORMANCE_FEE_BPS: z.coerce.number().int().min(0).max(3000).default(0),
  FEE_RECIPIENT: z.string().min(1).optional(),
  MIN_LIQUIDITY_RESERVE: z
    .string()
    .regex(/^\d+$/)
    .default("0")
    .transform((value) => BigInt(value)),

  // Lending
  POOL_ID: z.string().min(1).default("pool"),
  LENDING_RATE_BPS: z.coerce.number().int().min(0).max(10000).default(500),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
}).refine((config) => config.VAULT_ID !== config.POOL_ID, {
  message: "VAULT_ID and POOL_ID must name different custody accounts",
  path: ["POOL_ID"],
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly account: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:account1,key2:role2:account2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length !== 3) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:account`,
      );
    }

    const [key = "", roleName = "", account = ""] = parts;

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    const role = parseRole(roleName);
    if (role === undefined) {
      throw new Error(
        `Invalid role "${roleName}" in API_KEYS. Must be: viewer, depositor, agent, or admin`,
      );
    }
    if (account === "") {
      throw new Error("Account cannot be empty in API_KEYS");
    }

    keys.push({ key, role, account });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
