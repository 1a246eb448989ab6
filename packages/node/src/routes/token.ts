/**
 * Token read routes.
 *
 * GET /api/v1/token                                  — Metadata, supply and pause state
 * GET /api/v1/accounts/:address                      — Share and asset balances of a holder
 * GET /api/v1/accounts/:owner/allowances/:spender    — Share allowance
 * GET /api/v1/quotes/:kind?amount=                   — Preview and conversion quotes
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { QuoteKindSchema, QuoteQuerySchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { toWire } from "../types/wire.js";
import { parseQuery } from "../middleware/validate.js";
import { addressParam } from "./params.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/token", (c) => {
    const { asset, ...info } = c.get("service").tokenInfo();
    return c.json({ data: { ...toWire(info), asset: toWire(asset) } });
  });

  routes.get("/accounts/:address", (c) => {
    const account = addressParam("address", c.req.param("address"));
    return c.json({ data: toWire(c.get("service").accountInfo(account)) });
  });

  routes.get("/accounts/:owner/allowances/:spender", (c) => {
    const owner = addressParam("owner", c.req.param("owner"));
    const spender = addressParam("spender", c.req.param("spender"));
    const allowance = c.get("service").allowance(owner, spender);
    return c.json({ data: { owner, spender, allowance: allowance.toString() } });
  });

  routes.get("/quotes/:kind", (c) => {
    const kindResult = QuoteKindSchema.safeParse(c.req.param("kind"));
    if (!kindResult.success) {
      throw new ApiError("NOT_FOUND", 404, `Unknown quote '${c.req.param("kind")}'`, {
        allowed: QuoteKindSchema.options,
      });
    }
    const { amount } = parseQuery(c, QuoteQuerySchema);
    const result = c.get("service").quote(kindResult.data, amount);
    return c.json({
      data: { kind: kindResult.data, amount: amount.toString(), result: result.toString() },
    });
  });

  return routes;
}
