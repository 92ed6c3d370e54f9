/**
 * Event routes.
 *
 * GET /api/v1/events?limit=N — Most recent bank events, oldest first
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema, toEventDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = ListEventsQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const events = c.get("service").recentEvents(query.data.limit);
    return c.json({ data: events.map(toEventDto) });
  });

  return routes;
}
