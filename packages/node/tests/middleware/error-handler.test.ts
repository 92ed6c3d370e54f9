/**
 * Tests for error handler middleware.
 *
 * Verifies bank errors are mapped to HTTP status codes and that every
 * error leaves in the same envelope.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { BankError } from "@custody-bank/bank";
import type { AppEnv } from "../../src/types/api-contract.js";
import { STATUS_MAP, handleError, serializeDetails } from "../../src/middleware/error-handler.js";
import { ALICE } from "../setup.js";

function throwingApp(err: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("STATUS_MAP", () => {
  it("maps precondition failures to 422", () => {
    expect(STATUS_MAP.CAPACITY_EXCEEDED).toBe(422);
    expect(STATUS_MAP.LIMIT_EXCEEDED).toBe(422);
    expect(STATUS_MAP.INSUFFICIENT_FUNDS).toBe(422);
  });

  it("maps upstream failures to 502", () => {
    expect(STATUS_MAP.TRANSFER_FAILED).toBe(502);
    expect(STATUS_MAP.ORACLE_UNAVAILABLE).toBe(502);
  });
});

describe("serializeDetails", () => {
  it("renders bigints as decimal strings", () => {
    expect(serializeDetails({ amount: 12n, account: ALICE })).toEqual({
      amount: "12",
      account: ALICE,
    });
  });
});

describe("handleError", () => {
  it("returns the bank error code with serialized details", async () => {
    const app = throwingApp(
      new BankError("LIMIT_EXCEEDED", "Withdrawal of 5 exceeds the limit of 1", {
        amount: 5n,
        withdrawLimit: 1n,
      }),
    );
    const res = await app.request("/boom");

    expect(res.status).toBe(422);
    const body = (await res.json()) as { error: unknown };
    expect(body.error).toEqual({
      code: "LIMIT_EXCEEDED",
      message: "Withdrawal of 5 exceeds the limit of 1",
      details: { amount: "5", withdrawLimit: "1" },
    });
  });

  it("omits empty details", async () => {
    const app = throwingApp(new BankError("REENTRANCY_DETECTED", "Reentrant call", {}));
    const res = await app.request("/boom");

    expect(res.status).toBe(409);
    const body = (await res.json()) as { error: unknown };
    expect(body.error).toEqual({ code: "REENTRANCY_DETECTED", message: "Reentrant call" });
  });

  it("maps HTTPException by status", async () => {
    const app = throwingApp(new HTTPException(404, { message: "gone" }));
    const res = await app.request("/boom");

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: unknown };
    expect(body.error).toEqual({ code: "NOT_FOUND", message: "gone" });
  });

  it("hides unexpected errors behind a 500", async () => {
    const app = throwingApp(new Error("database password is test-secret"));
    const res = await app.request("/boom");

    expect(res.status).toBe(500);
    const body = (await res.json()) as { error: unknown };
    expect(body.error).toEqual({ code: "INTERNAL_ERROR", message: "Internal server error" });
  });
});
