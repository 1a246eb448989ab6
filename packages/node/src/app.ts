/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { VaultLogger } from "@wtoken/vault";
import type { AppEnv } from "./types/api-contract.js";
import { WrapperService } from "./services/wrapper-service.js";
import type { WrapperServiceConfig } from "./services/wrapper-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { serviceMiddleware } from "./middleware/service.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTokenRoutes } from "./routes/token.js";
import { createVaultRoutes } from "./routes/vault.js";
import { createTransferRoutes } from "./routes/transfers.js";
import { createPermitRoutes } from "./routes/permit.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createAssetRoutes } from "./routes/asset.js";
import { createEventRoutes } from "./routes/events.js";
import { createErrorEnvelope } from "./types/error.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: WrapperServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives the token's own log records. Default: silent */
  readonly logger?: VaultLogger;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: WrapperService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new WrapperService(options.serviceConfig, options.logger);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", serviceMiddleware(service));

  app.route("/api/v1", createTokenRoutes());
  app.route("/api/v1", createTransferRoutes());
  app.route("/api/v1/vault", createVaultRoutes());
  app.route("/api/v1/permit", createPermitRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/asset", createAssetRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
