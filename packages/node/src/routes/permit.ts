/**
 * Permit routes.
 *
 * GET  /api/v1/permit/domain  — EIP-712 domain and separator to sign against
 * POST /api/v1/permit         — Submit an owner-signed approval (any relayer)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PermitSchema } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";

export function createPermitRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/domain", (c) => {
    const { domain, separator } = c.get("service").permitDomain();
    return c.json({ data: { domain, separator } });
  });

  routes.post("/", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, PermitSchema);
    await service.permit(body.owner, body.spender, body.value, body.deadline, body.signature);
    return c.json({
      data: {
        owner: body.owner,
        spender: body.spender,
        allowance: service.allowance(body.owner, body.spender).toString(),
        nonce: service.token.nonces(body.owner).toString(),
      },
    });
  });

  return routes;
}
