/**
 * Makes the WrapperService available to handlers as c.get("service").
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { WrapperService } from "../services/wrapper-service.js";

export function serviceMiddleware(service: WrapperService): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("service", service);
    await next();
  };
}
