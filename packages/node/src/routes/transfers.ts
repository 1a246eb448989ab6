/**
 * Share transfer routes. The caller is the X-Account header.
 *
 * POST /api/v1/transfers  — Move shares; a `from` other than the caller spends allowance
 * POST /api/v1/approvals  — Set the caller's share allowance for a spender
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApproveSchema, TransferSchema } from "../types/dto.js";
import { accountMiddleware } from "../middleware/account.js";
import { parseBody } from "../middleware/validate.js";

export function createTransferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  routes.post("/transfers", accountMiddleware(), async (c) => {
    const caller = c.get("account");
    const body = await parseBody(c, TransferSchema);
    const from = body.from ?? caller;
    c.get("service").transfer(caller, from, body.to, body.amount);
    return c.json({ data: { from, to: body.to, amount: body.amount.toString() } });
  });

  routes.post("/approvals", accountMiddleware(), async (c) => {
    const owner = c.get("account");
    const body = await parseBody(c, ApproveSchema);
    c.get("service").approve(owner, body.spender, body.amount);
    return c.json({
      data: { owner, spender: body.spender, amount: body.amount.toString() },
    });
  });

  return routes;
}
