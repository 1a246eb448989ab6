/**
 * Role-gated administration. The caller is the X-Account header and
 * must hold PAUSE_ROLE.
 *
 * POST /api/v1/admin/pause
 * POST /api/v1/admin/unpause
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { accountMiddleware } from "../middleware/account.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  routes.use("*", accountMiddleware());

  routes.post("/pause", (c) => {
    const service = c.get("service");
    service.pause(c.get("account"));
    return c.json({ data: { pausedLocally: service.token.pausedLocally() } });
  });

  routes.post("/unpause", (c) => {
    const service = c.get("service");
    service.unpause(c.get("account"));
    return c.json({ data: { pausedLocally: service.token.pausedLocally() } });
  });

  return routes;
}
