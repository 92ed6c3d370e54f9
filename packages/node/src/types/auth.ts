/**
 * Caller identification types.
 *
 * The bank authorizes by address. The HTTP layer only has to work out
 * which address a request acts as:
 * 1. API key via X-Api-Key header, mapped to an address in configuration
 * 2. X-Caller-Address header, when no keys are configured (development, tests)
 */

import type { Address } from "@custody-bank/types";

export type CallerSource = "api-key" | "header";

/**
 * Resolved caller, set by the auth middleware.
 */
export interface CallerContext {
  readonly source: CallerSource;
  readonly address: Address;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly address: Address;
}
