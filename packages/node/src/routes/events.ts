/**
 * Event query routes.
 *
 * GET /api/v1/events?afterSequence=&limit=&type=  — Committed token events in order
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { parseQuery } from "../middleware/validate.js";
import { toEventDto } from "../types/wire.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const query = parseQuery(c, ListEventsQuerySchema);

    // One extra record tells whether another page exists
    const records = service.events({
      fromSequence: (query.afterSequence ?? 0) + 1,
      maxCount: query.limit + 1,
      ...(query.type !== undefined ? { type: query.type } : {}),
    });
    const page = records.slice(0, query.limit);
    const last = page[page.length - 1];

    return c.json({
      data: page.map(toEventDto),
      pagination: {
        hasMore: records.length > query.limit,
        nextAfterSequence: last !== undefined ? last.sequence : null,
        lastSequence: service.token.events.lastSequence(),
      },
    });
  });

  return routes;
}
