/**
 * Vault routes. The caller is the X-Account header.
 *
 * POST /api/v1/vault/deposit   — Pull assets, mint shares to receiver
 * POST /api/v1/vault/mint      — Mint exact shares, pull the assets they cost
 * POST /api/v1/vault/withdraw  — Burn the shares exact assets cost, pay receiver
 * POST /api/v1/vault/redeem    — Burn exact shares, pay receiver
 *
 * Receiver and owner default to the caller.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  DepositSchema,
  MintSchema,
  RedeemSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { accountMiddleware } from "../middleware/account.js";
import { parseBody } from "../middleware/validate.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  routes.use("*", accountMiddleware());

  routes.post("/deposit", async (c) => {
    const caller = c.get("account");
    const body = await parseBody(c, DepositSchema);
    const receiver = body.receiver ?? caller;
    const shares = c.get("service").deposit(caller, body.assets, receiver);
    return c.json({
      data: { assets: body.assets.toString(), shares: shares.toString(), receiver },
    });
  });

  routes.post("/mint", async (c) => {
    const caller = c.get("account");
    const body = await parseBody(c, MintSchema);
    const receiver = body.receiver ?? caller;
    const assets = c.get("service").mint(caller, body.shares, receiver);
    return c.json({
      data: { assets: assets.toString(), shares: body.shares.toString(), receiver },
    });
  });

  routes.post("/withdraw", async (c) => {
    const caller = c.get("account");
    const body = await parseBody(c, WithdrawSchema);
    const owner = body.owner ?? caller;
    const receiver = body.receiver ?? caller;
    const shares = c.get("service").withdraw(caller, body.assets, owner, receiver);
    return c.json({
      data: { assets: body.assets.toString(), shares: shares.toString(), owner, receiver },
    });
  });

  routes.post("/redeem", async (c) => {
    const caller = c.get("account");
    const body = await parseBody(c, RedeemSchema);
    const owner = body.owner ?? caller;
    const receiver = body.receiver ?? caller;
    const assets = c.get("service").redeem(caller, body.shares, owner, receiver);
    return c.json({
      data: { assets: assets.toString(), shares: body.shares.toString(), owner, receiver },
    });
  });

  return routes;
}
