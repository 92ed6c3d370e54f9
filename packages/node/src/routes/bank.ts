/**
 * Bank overview route.
 *
 * GET /api/v1/bank — Totals, counters, limits, owner and oracle
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toBankStatsDto } from "../types/dto.js";

export function createBankRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const stats = await c.get("service").bank.getStats();
    return c.json({ data: toBankStatsDto(stats) });
  });

  return routes;
}
