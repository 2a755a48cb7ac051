/**
 * Vault routes.
 *
 * GET    /api/v1/vault                         — Vault state
 * GET    /api/v1/vault/holders/:holder         — Share position and exit limits
 * GET    /api/v1/vault/allowances/:owner/:spender
 * GET    /api/v1/vault/quote/deposit?assets=   — Fee-aware deposit quote
 * GET    /api/v1/vault/quote/withdraw?assets=
 * GET    /api/v1/vault/quote/redeem?shares=
 * POST   /api/v1/vault/deposit                 — Deposit assets, mint shares
 * POST   /api/v1/vault/withdraw                — Burn shares for exact assets
 * POST   /api/v1/vault/redeem                  — Burn exact shares for assets
 * POST   /api/v1/vault/approve                 — Set a share allowance
 * POST   /api/v1/vault/transfer                — Move shares
 * POST   /api/v1/vault/route                   — Route native value (agent)
 * GET    /api/v1/vault/calls                   — Dispatched external calls
 * GET    /api/v1/vault/strategies
 * POST   /api/v1/vault/strategies              — Register a strategy (admin)
 * DELETE /api/v1/vault/strategies/:id          — Remove a strategy (admin)
 * POST   /api/v1/vault/strategies/:id/execute  — Route through a strategy (agent)
 * POST   /api/v1/vault/performance-fee         — Collect the performance fee (admin)
 * POST   /api/v1/vault/fees                    — Set a fee rate (admin)
 * POST   /api/v1/vault/fee-recipient           — (admin)
 * POST   /api/v1/vault/reserve                 — Minimum native reserve (admin)
 * POST   /api/v1/vault/ownership               — (admin)
 *
 * The acting account is always the authenticated caller. Ledger
 * capabilities are enforced by the ledger itself; the permission
 * guards here only reject requests early.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { KeelService } from "../services/keel-service.js";
import {
  ApproveSchema,
  AssetsQuerySchema,
  DepositSchema,
  ExecuteStrategySchema,
  FeeRecipientSchema,
  OwnershipSchema,
  RedeemSchema,
  RegisterStrategySchema,
  ReserveSchema,
  RouteFundsSchema,
  SetFeeSchema,
  SharesQuerySchema,
  TransferSharesSchema,
  WithdrawSchema,
} from "../types/dto.js";
import {
  depositView,
  dispatchedCallView,
  performanceFeeView,
  quoteView,
  routePlanView,
  withdrawView,
} from "../types/views.js";
import { readBody, readQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export function createVaultRoutes(service: KeelService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const vault = service.vault;

  routes.use("*", requirePermission("read"));

  // ─── Reads ─────────────────────────────────────────────────────────

  routes.get("/", (c) => {
    return c.json({ data: service.vaultState() });
  });

  routes.get("/holders/:holder", (c) => {
    const holder = c.req.param("holder");
    const shares = vault.balanceOf(holder);
    return c.json({
      data: {
        holder,
        shares: shares.toString(),
        assets: vault.convertToAssets(shares).toString(),
        maxWithdraw: vault.maxWithdraw(holder).toString(),
        maxRedeem: vault.maxRedeem(holder).toString(),
      },
    });
  });

  routes.get("/allowances/:owner/:spender", (c) => {
    const owner = c.req.param("owner");
    const spender = c.req.param("spender");
    return c.json({
      data: { owner, spender, shares: vault.allowance(owner, spender).toString() },
    });
  });

  routes.get("/quote/deposit", (c) => {
    const { assets } = readQuery(c, AssetsQuerySchema);
    return c.json({ data: quoteView(vault.quoteDeposit(assets)) });
  });

  routes.get("/quote/withdraw", (c) => {
    const { assets } = readQuery(c, AssetsQuerySchema);
    return c.json({ data: quoteView(vault.quoteWithdraw(assets)) });
  });

  routes.get("/quote/redeem", (c) => {
    const { shares } = readQuery(c, SharesQuerySchema);
    return c.json({ data: quoteView(vault.quoteRedeem(shares)) });
  });

  routes.get("/strategies", (c) => {
    return c.json({ data: vault.listStrategies() });
  });

  routes.get("/calls", (c) => {
    return c.json({ data: service.dispatchedCalls().map(dispatchedCallView) });
  });

  // ─── Deposits and exits ────────────────────────────────────────────

  routes.post("/deposit", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, DepositSchema);
    const receipt = service.deposit(account, body.assets, body.receiver ?? account);
    return c.json({ data: depositView(receipt) }, 201);
  });

  routes.post("/withdraw", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, WithdrawSchema);
    const receipt = service.withdraw(
      account,
      body.assets,
      body.receiver ?? account,
      body.owner ?? account,
    );
    return c.json({ data: withdrawView(receipt) });
  });

  routes.post("/redeem", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, RedeemSchema);
    const receipt = service.redeem(
      account,
      body.shares,
      body.receiver ?? account,
      body.owner ?? account,
    );
    return c.json({ data: withdrawView(receipt) });
  });

  // ─── Share token ───────────────────────────────────────────────────

  routes.post("/approve", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, ApproveSchema);
    const shares = service.approve(account, body.spender, body.shares);
    return c.json({ data: { owner: account, spender: body.spender, shares: shares.toString() } });
  });

  routes.post("/transfer", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, TransferSharesSchema);
    const from = body.from ?? account;
    service.transferShares(account, from, body.to, body.shares);
    return c.json({ data: { from, to: body.to, shares: body.shares.toString() } });
  });

  // ─── Routing ───────────────────────────────────────────────────────

  routes.post("/route", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, RouteFundsSchema);
    const plan = service.routeFunds(account, body);
    return c.json({ data: routePlanView(plan) });
  });

  routes.post("/strategies", requirePermission("admin"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, RegisterStrategySchema);
    const strategy = service.registerStrategy(account, body);
    return c.json({ data: strategy }, 201);
  });

  routes.delete("/strategies/:id", requirePermission("admin"), (c) => {
    const { account } = c.get("auth");
    const id = c.req.param("id");
    if (vault.getStrategy(id) === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Strategy '${id}' not found`), 404);
    }
    const removed = service.removeStrategy(account, id);
    return c.json({ data: removed });
  });

  routes.post("/strategies/:id/execute", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, ExecuteStrategySchema);
    const plan = service.executeStrategy(account, c.req.param("id"), body.payload, body.value);
    return c.json({ data: routePlanView(plan) });
  });

  // ─── Fees and administration ───────────────────────────────────────

  routes.post("/performance-fee", requirePermission("admin"), (c) => {
    const { account } = c.get("auth");
    const receipt = service.collectPerformanceFee(account);
    return c.json({ data: performanceFeeView(receipt) });
  });

  routes.post("/fees", requirePermission("admin"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, SetFeeSchema);
    const fees = service.setFee(account, body.kind, body.bps);
    return c.json({ data: fees });
  });

  routes.post("/fee-recipient", requirePermission("admin"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, FeeRecipientSchema);
    const recipient = service.setFeeRecipient(account, body.recipient);
    return c.json({ data: { feeRecipient: recipient } });
  });

  routes.post("/reserve", requirePermission("admin"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, ReserveSchema);
    const reserve = service.setMinLiquidityReserve(account, body.amount);
    return c.json({ data: { minLiquidityReserve: reserve.toString() } });
  });

  routes.post("/ownership", requirePermission("admin"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, OwnershipSchema);
    const previousOwner = service.transferOwnership(account, body.newOwner);
    return c.json({ data: { previousOwner, owner: body.newOwner } });
  });

  return routes;
}
