/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to an injected log function;
 * main.ts routes it into the pino root logger.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@custody-bank/types";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Address the request acted as, when one was resolved */
  readonly caller?: Address | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      caller: c.get("caller")?.address,
    });
  };
}
