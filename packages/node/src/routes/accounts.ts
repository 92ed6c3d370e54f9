/**
 * Account routes.
 *
 * GET /api/v1/accounts/:address         — Balance in wei and ether
 * GET /api/v1/accounts/:address/history — History records, in the order written
 * GET /api/v1/accounts/:address/value   — Balance valued in the quote currency
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { formatUnits } from "@custody-bank/bank";
import { NATIVE_DECIMALS } from "@custody-bank/types";
import type { Address } from "@custody-bank/types";
import type { AppEnv } from "../types/api-contract.js";
import { formatZodErrors } from "../middleware/validate.js";
import {
  AddressSchema,
  ValueQuerySchema,
  toHistoryDto,
  toValuationDto,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

type AddressParse =
  | { readonly ok: true; readonly address: Address }
  | { readonly ok: false; readonly response: Response };

function parseAddressParam(c: Context<AppEnv>): AddressParse {
  const result = AddressSchema.safeParse(c.req.param("address"));
  if (!result.success) {
    return {
      ok: false,
      response: c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid account address"), 400),
    };
  }
  return { ok: true, address: result.data };
}

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address", async (c) => {
    const parsed = parseAddressParam(c);
    if (!parsed.ok) return parsed.response;

    const balance = await c.get("service").bank.getBalance(parsed.address);
    return c.json({
      data: {
        address: parsed.address,
        balance: balance.toString(),
        balanceEther: formatUnits(balance, NATIVE_DECIMALS),
      },
    });
  });

  routes.get("/:address/history", async (c) => {
    const parsed = parseAddressParam(c);
    if (!parsed.ok) return parsed.response;

    const history = await c.get("service").bank.getHistory(parsed.address);
    return c.json({ data: toHistoryDto(history) });
  });

  routes.get("/:address/value", async (c) => {
    const parsed = parseAddressParam(c);
    if (!parsed.ok) return parsed.response;

    const query = ValueQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(query.error),
        }),
        400,
      );
    }

    const valuation = await c
      .get("service")
      .bank.getQuoteValue(parsed.address, query.data.decimals);
    return c.json({ data: toValuationDto(valuation) });
  });

  return routes;
}
