/**
 * Global error handler.
 *
 * Catches everything thrown by route handlers and produces the error
 * envelope. Bank errors keep their code and structured details; bigint
 * details are rendered as decimal strings.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { isBankError } from "@custody-bank/bank";
import type { BankErrorCode } from "@custody-bank/bank";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiErrorCode } from "../types/error.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type BankErrorStatus = 400 | 403 | 409 | 422 | 502;

export const STATUS_MAP: Readonly<Record<BankErrorCode, BankErrorStatus>> = {
  // Preconditions of the operation itself
  CAPACITY_EXCEEDED: 422,
  LIMIT_EXCEEDED: 422,
  INSUFFICIENT_FUNDS: 422,

  // Authorization & concurrency
  NOT_AUTHORIZED: 403,
  REENTRANCY_DETECTED: 409,

  // Upstream failures
  TRANSFER_FAILED: 502,
  ORACLE_UNAVAILABLE: 502,

  // Malformed input
  INVALID_AMOUNT: 400,
  INVALID_DECIMALS: 400,
  INVALID_SNAPSHOT: 400,
};

const HTTP_EXCEPTION_CODES: Partial<Record<number, ApiErrorCode>> = {
  400: "VALIDATION_ERROR",
  401: "UNAUTHORIZED",
  404: "NOT_FOUND",
};

/**
 * Render error details for JSON: bigints become decimal strings.
 */
export function serializeDetails(details: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, raw] of Object.entries(details)) {
    const value: unknown = raw;
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  if (isBankError(err)) {
    const details = serializeDetails(err.details);
    return c.json(
      createErrorEnvelope(
        err.code,
        err.message,
        Object.keys(details).length > 0 ? details : undefined,
      ),
      STATUS_MAP[err.code],
    );
  }

  if (err instanceof HTTPException) {
    const code = HTTP_EXCEPTION_CODES[err.status] ?? "INTERNAL_ERROR";
    return c.json(createErrorEnvelope(code, err.message), err.status);
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}
