/**
 * Lending pool routes.
 *
 * GET  /api/v1/pool                    — Pool state and positions
 * GET  /api/v1/pool/accounts/:account  — Position with interest projected to ?at= (default now)
 * POST /api/v1/pool/deposit            — Supply principal
 * POST /api/v1/pool/withdraw           — Withdraw principal with its interest
 * POST /api/v1/pool/accrue             — Commit interest for an account
 * POST /api/v1/pool/rate               — Change the annual rate (admin)
 * POST /api/v1/pool/reserves           — Fund the pool's interest reserves
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { KeelService } from "../services/keel-service.js";
import {
  AccrueSchema,
  PoolAmountSchema,
  ProjectionQuerySchema,
  RateSchema,
} from "../types/dto.js";
import {
  accrualView,
  poolDepositView,
  poolWithdrawalView,
  rateChangeView,
} from "../types/views.js";
import { readBody, readQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createLendingRoutes(service: KeelService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const pool = service.pool;

  routes.use("*", requirePermission("read"));

  routes.get("/", (c) => {
    return c.json({ data: service.poolState() });
  });

  routes.get("/accounts/:account", (c) => {
    const account = c.req.param("account");
    const { at } = readQuery(c, ProjectionQuerySchema);
    const instant = at ?? service.clock.now();
    return c.json({
      data: {
        account,
        principal: pool.principalOf(account).toString(),
        accruedInterest: pool.accruedInterestOf(account).toString(),
        projectedInterest: pool.getAccruedInterest(account, instant).toString(),
        at: instant,
      },
    });
  });

  routes.post("/deposit", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, PoolAmountSchema);
    const receipt = service.poolDeposit(account, body.amount);
    return c.json({ data: poolDepositView(receipt) }, 201);
  });

  routes.post("/withdraw", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, PoolAmountSchema);
    const receipt = service.poolWithdraw(account, body.amount);
    return c.json({ data: poolWithdrawalView(receipt) });
  });

  // Accrual moves no funds; anyone with write access may settle any account.
  routes.post("/accrue", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, AccrueSchema);
    const result = service.accrue(body.account ?? account);
    return c.json({ data: accrualView(result) });
  });

  routes.post("/rate", requirePermission("admin"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, RateSchema);
    const change = service.updateRate(account, body.annualRateBps);
    return c.json({ data: rateChangeView(change) });
  });

  routes.post("/reserves", requirePermission("write"), async (c) => {
    const { account } = c.get("auth");
    const body = await readBody(c, PoolAmountSchema);
    const liquidity = service.fundReserves(account, body.amount);
    return c.json({ data: { liquidity: liquidity.toString() } });
  });

  return routes;
}
