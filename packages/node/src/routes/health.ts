/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (ledger invariants hold)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { BankService } from "../services/bank-service.js";

export function createHealthRoutes(service: BankService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", async (c) => {
    const { ready, errors } = await service.checkReady();
    const body = {
      status: ready ? "ready" : "not_ready",
      errors,
      timestamp: new Date().toISOString(),
    };
    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
