/**
 * Runtime Type Guards
 *
 * Narrowing functions for Keel types, used at system boundaries
 * (API inputs, restored snapshots, configuration).
 */

import type { AccountId, Capability } from "./identity.js";
import type { AmountString, Bps, Money } from "./financial.js";
import { CAPABILITIES } from "./identity.js";

const CAPABILITY_SET = new Set<string>(CAPABILITIES);

export function isAccountId(value: unknown): value is AccountId {
  return typeof value === "string" && value.trim().length > 0;
}

export function isCapability(value: unknown): value is Capability {
  return typeof value === "string" && CAPABILITY_SET.has(value);
}

export function isAmountString(value: unknown): value is AmountString {
  return typeof value === "string" && /^\d+$/.test(value);
}

export function isBps(value: unknown): value is Bps {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 10_000
  );
}

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    typeof v.currency === "string" &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}
