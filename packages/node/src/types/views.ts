/**
 * Response views.
 *
 * JSON has no bigint: every amount leaves the API as a base-unit
 * integer string, the same encoding requests use.
 */

import type {
  AccrualResult,
  PrincipalDepositReceipt,
  PrincipalWithdrawalReceipt,
  RateChange,
} from "@keel/lending";
import type {
  DepositReceipt,
  PerformanceFeeReceipt,
  Quote,
  RoutePlan,
  WithdrawReceipt,
} from "@keel/vault";
import type { DispatchedCall } from "../services/book-call-executor.js";

export function depositView(r: DepositReceipt) {
  return {
    caller: r.caller,
    receiver: r.receiver,
    assets: r.assets.toString(),
    fee: r.fee.toString(),
    feeTransferred: r.feeTransferred,
    netAssets: r.netAssets.toString(),
    shares: r.shares.toString(),
  };
}

export function withdrawView(r: WithdrawReceipt) {
  return { ...depositView(r), owner: r.owner };
}

export function quoteView(q: Quote) {
  return {
    assets: q.assets.toString(),
    fee: q.fee.toString(),
    netAssets: q.netAssets.toString(),
    shares: q.shares.toString(),
  };
}

export function performanceFeeView(r: PerformanceFeeReceipt) {
  return { base: r.base.toString(), fee: r.fee.toString(), transferred: r.transferred };
}

export function routePlanView(plan: RoutePlan) {
  return {
    calls: plan.calls.map((call) => ({
      destination: call.destination,
      payload: call.payload,
      value: call.value.toString(),
    })),
    totalValue: plan.totalValue.toString(),
    nativeBalance: plan.nativeBalance.toString(),
    remaining: plan.remaining.toString(),
  };
}

export function accrualView(r: AccrualResult) {
  return {
    account: r.account,
    interestDelta: r.interestDelta.toString(),
    accruedInterest: r.accruedInterest.toString(),
    elapsed: r.elapsed,
    at: r.at,
  };
}

export function poolDepositView(r: PrincipalDepositReceipt) {
  return {
    account: r.account,
    amount: r.amount.toString(),
    principal: r.principal.toString(),
    accruedInterest: r.accruedInterest.toString(),
  };
}

export function poolWithdrawalView(r: PrincipalWithdrawalReceipt) {
  return {
    account: r.account,
    amount: r.amount.toString(),
    interest: r.interest.toString(),
    paid: r.paid.toString(),
    principal: r.principal.toString(),
    accruedInterest: r.accruedInterest.toString(),
  };
}

export function rateChangeView(r: RateChange) {
  return {
    previousRateBps: r.previousRateBps,
    annualRateBps: r.annualRateBps,
    accrual: accrualView(r.accrual),
  };
}

export function dispatchedCallView(call: DispatchedCall) {
  return {
    from: call.from,
    destination: call.destination,
    payload: call.payload,
    value: call.value.toString(),
    dispatchedAt: call.dispatchedAt,
  };
}
