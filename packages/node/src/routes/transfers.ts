/**
 * Deposit and withdrawal routes.
 *
 * POST /api/v1/deposits    — Credit the caller
 * POST /api/v1/withdrawals — Debit the caller and pay out
 *
 * Both act for the resolved caller; there is no way to move another
 * account's funds.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requireCaller } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import {
  DepositSchema,
  WithdrawalSchema,
  toDepositDto,
  toWithdrawalDto,
} from "../types/dto.js";

export function createDepositRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(DepositSchema), async (c) => {
    const caller = requireCaller(c);
    const { amount } = c.req.valid("json");

    const receipt = await c.get("service").bank.deposit(caller, amount);
    return c.json({ data: toDepositDto(receipt) }, 201);
  });

  return routes;
}

export function createWithdrawalRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(WithdrawalSchema), async (c) => {
    const caller = requireCaller(c);
    const { amount } = c.req.valid("json");

    const receipt = await c.get("service").bank.withdraw(caller, amount);
    return c.json({ data: toWithdrawalDto(receipt) }, 201);
  });

  return routes;
}
