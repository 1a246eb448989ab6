/**
 * Calling-account middleware.
 *
 * The devnet has no key custody: the caller names itself in the
 * X-Account header. Mutating routes read it from c.get("account").
 */

import type { MiddlewareHandler } from "hono";
import { getAddress } from "viem";
import { isHolderAddress } from "@wtoken/types";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

export const ACCOUNT_HEADER = "X-Account";

export function accountMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header(ACCOUNT_HEADER);
    if (header === undefined) {
      throw new ApiError("MISSING_ACCOUNT", 400, `${ACCOUNT_HEADER} header is required`);
    }
    if (!isHolderAddress(header)) {
      throw new ApiError("VALIDATION_ERROR", 400, `${ACCOUNT_HEADER} is not an address`, {
        account: header,
      });
    }

    c.set("account", getAddress(header));
    await next();
  };
}
