/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@wtoken/types";
import type { WrapperService } from "../services/wrapper-service.js";

/**
 * Hono environment type for the devnet app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The token service (set for every /api route) */
    service: WrapperService;

    /** Calling account from X-Account (set by account middleware on mutating routes) */
    account: Address;
  };
}
