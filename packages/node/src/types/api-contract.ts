/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { BankService } from "../services/bank-service.js";
import type { CallerContext } from "./auth.js";

/**
 * Hono environment type for the custody node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The bank this node serves */
    service: BankService;

    /** Who the request acts as; undefined for anonymous reads (set by auth middleware) */
    caller: CallerContext | undefined;
  };
}
