/**
 * Token book routes.
 *
 * GET  /api/v1/balances/:holder  — Asset and native balances
 * POST /api/v1/balances/credit   — Mint units to a holder (admin faucet)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { KeelService } from "../services/keel-service.js";
import { CreditSchema } from "../types/dto.js";
import { readBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createBalanceRoutes(service: KeelService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("read"));

  routes.get("/:holder", (c) => {
    const holder = c.req.param("holder");
    const asset = service.balanceOf(holder, "asset");
    return c.json({
      data: {
        holder,
        asset: asset.toString(),
        native: service.balanceOf(holder, "native").toString(),
        display: service.display(asset),
      },
    });
  });

  routes.post("/credit", requirePermission("admin"), async (c) => {
    const body = await readBody(c, CreditSchema);
    const balance = service.credit(body.holder, body.amount, body.book);
    return c.json({
      data: { holder: body.holder, book: body.book, balance: balance.toString() },
    }, 201);
  });

  return routes;
}
