/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (token initialized and bound to its asset)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { WrapperService } from "../services/wrapper-service.js";

export function createHealthRoutes(service: WrapperService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        paused: ready ? service.token.paused() : undefined,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
