/**
 * Devnet controls of the in-memory rebasing asset.
 *
 * POST /api/v1/asset/mint        — Credit asset to an account
 * POST /api/v1/asset/approve     — Caller (X-Account) approves a spender
 * POST /api/v1/asset/multiplier  — Set the bonus multiplier (WAD-scaled)
 * POST /api/v1/asset/pause
 * POST /api/v1/asset/unpause
 * POST /api/v1/asset/ban
 * POST /api/v1/asset/unban
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AssetApproveSchema,
  AssetMintSchema,
  BanSchema,
  MultiplierSchema,
} from "../types/dto.js";
import { accountMiddleware } from "../middleware/account.js";
import { parseBody } from "../middleware/validate.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/mint", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, AssetMintSchema);
    service.assetMint(body.to, body.amount);
    return c.json({
      data: { to: body.to, balance: service.asset.balanceOf(body.to).toString() },
    });
  });

  routes.post("/approve", accountMiddleware(), async (c) => {
    const owner = c.get("account");
    const body = await parseBody(c, AssetApproveSchema);
    c.get("service").assetApprove(owner, body.spender, body.amount);
    return c.json({
      data: { owner, spender: body.spender, amount: body.amount.toString() },
    });
  });

  routes.post("/multiplier", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, MultiplierSchema);
    service.setMultiplier(body.multiplier);
    return c.json({
      data: {
        multiplier: service.asset.multiplier.toString(),
        totalAssets: service.token.totalAssets().toString(),
      },
    });
  });

  routes.post("/pause", (c) => {
    const service = c.get("service");
    service.pauseAsset();
    return c.json({ data: { paused: service.asset.isPaused() } });
  });

  routes.post("/unpause", (c) => {
    const service = c.get("service");
    service.unpauseAsset();
    return c.json({ data: { paused: service.asset.isPaused() } });
  });

  routes.post("/ban", async (c) => {
    const body = await parseBody(c, BanSchema);
    c.get("service").ban(body.accounts);
    return c.json({ data: { banned: body.accounts } });
  });

  routes.post("/unban", async (c) => {
    const body = await parseBody(c, BanSchema);
    c.get("service").unban(body.accounts);
    return c.json({ data: { unbanned: body.accounts } });
  });

  return routes;
}
