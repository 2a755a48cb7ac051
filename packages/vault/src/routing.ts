/**
 * Fund routing precondition.
 *
 * Validates a batch of outbound calls before any of them runs:
 * - destinations, payloads and values line up one-to-one
 * - every destination is a real account and every value is non-negative
 * - the native balance left afterwards stays at or above the reserve
 *
 * Executing the calls is the executor's business, not the ledger's.
 */

import { isAccountId } from "@keel/types";
import type { AccountId, ExternalCall } from "@keel/types";
import type { RoutePlan } from "./types.js";
import { VaultError } from "./types.js";

export interface RouteRequest {
  readonly destinations: readonly AccountId[];
  readonly payloads: readonly string[];
  readonly values: readonly bigint[];
}

export function planRoute(
  request: RouteRequest,
  nativeBalance: bigint,
  minLiquidityReserve: bigint,
): RoutePlan {
  const { destinations, payloads, values } = request;

  if (
    destinations.length === 0 ||
    destinations.length !== payloads.length ||
    destinations.length !== values.length
  ) {
    throw new VaultError(
      "INVALID_EXECUTE_PARAMS",
      `Mismatched routing arrays: ${String(destinations.length)} destinations, ${String(payloads.length)} payloads, ${String(values.length)} values`,
    );
  }

  const calls: ExternalCall[] = [];
  let totalValue = 0n;

  destinations.forEach((destination, i) => {
    const payload = payloads[i];
    const value = values[i];
    if (!isAccountId(destination) || payload === undefined || value === undefined || value < 0n) {
      throw new VaultError("INVALID_EXECUTE_PARAMS", `Invalid routed call at index ${String(i)}`);
    }
    calls.push({ destination, payload, value });
    totalValue += value;
  });

  if (nativeBalance < totalValue + minLiquidityReserve) {
    throw new VaultError(
      "INSUFFICIENT_LIQUIDITY",
      `Routing ${totalValue.toString()} from a balance of ${nativeBalance.toString()} would breach the reserve of ${minLiquidityReserve.toString()}`,
    );
  }

  return {
    calls,
    totalValue,
    nativeBalance,
    remaining: nativeBalance - totalValue,
  };
}
