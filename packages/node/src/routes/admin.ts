/**
 * Administration routes. Owner only; the bank enforces it.
 *
 * POST /api/v1/admin/owner  — Hand over ownership
 * POST /api/v1/admin/oracle — Repoint the price oracle
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requireCaller } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { ChangeOwnerSchema, UpdateOracleSchema } from "../types/dto.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/owner", validateBody(ChangeOwnerSchema), async (c) => {
    const caller = requireCaller(c);
    const { newOwner } = c.req.valid("json");
    const bank = c.get("service").bank;

    await bank.changeOwner(caller, newOwner);
    return c.json({ data: { owner: bank.admin.owner } });
  });

  routes.post("/oracle", validateBody(UpdateOracleSchema), async (c) => {
    const caller = requireCaller(c);
    const { oracleAddress } = c.req.valid("json");
    const bank = c.get("service").bank;

    await bank.updateOracleAddress(caller, oracleAddress);
    return c.json({ data: { oracleAddress: bank.admin.oracleAddress } });
  });

  return routes;
}
