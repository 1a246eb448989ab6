/**
 * Request logging middleware.
 *
 * Emits one structured entry per request through an injected sink;
 * main.ts forwards entries to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ACCOUNT_HEADER } from "./account.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Raw X-Account header, when the caller sent one */
  readonly account?: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    const account = c.req.header(ACCOUNT_HEADER);
    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      ...(account !== undefined ? { account } : {}),
    };

    log(entry);
  };
}
