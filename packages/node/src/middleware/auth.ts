/**
 * Caller resolution middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. X-Caller-Address header → trusted as-is; only when no keys are configured
 *
 * Sets `c.set("caller", ...)`. Reads may be anonymous; handlers that act
 * for someone call `requireCaller`, which fails with 401.
 */

import type { Context, MiddlewareHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Address } from "@custody-bank/types";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, CallerContext } from "../types/auth.js";
import { AddressSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_ADDRESS_HEADER = "X-Caller-Address";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * With `config`, every request needs a valid API key.
 * Without it, the caller is whatever X-Caller-Address says.
 */
export function callerMiddleware(config?: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let caller: CallerContext | undefined;

    if (config !== undefined) {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
      }
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
      }
      caller = { source: "api-key", address: record.address };
    } else {
      const header = c.req.header(CALLER_ADDRESS_HEADER);
      if (header !== undefined) {
        const parsed = AddressSchema.safeParse(header);
        if (!parsed.success) {
          return c.json(
            createErrorEnvelope("VALIDATION_ERROR", `Invalid ${CALLER_ADDRESS_HEADER} header`),
            400,
          );
        }
        caller = { source: "header", address: parsed.data };
      }
    }

    c.set("caller", caller);
    return next();
  };
}

/**
 * The address the request acts as. Throws 401 for anonymous requests.
 */
export function requireCaller(c: Context<AppEnv>): Address {
  const caller = c.get("caller");
  if (caller === undefined) {
    throw new HTTPException(401, {
      message: `Caller unknown: send ${API_KEY_HEADER} or ${CALLER_ADDRESS_HEADER}`,
    });
  }
  return caller.address;
}
