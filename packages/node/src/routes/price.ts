/**
 * Price route.
 *
 * GET /api/v1/price — Latest oracle price (8 decimals)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toPriceDto } from "../types/dto.js";

export function createPriceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", async (c) => {
    const quote = await c.get("service").bank.getPrice();
    return c.json({ data: toPriceDto(quote) });
  });

  return routes;
}
