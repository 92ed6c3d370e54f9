/**
 * Tests for administration routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ALICE, BOB, ORACLE_2, OWNER, as, createTestApp, jsonRequest } from "./setup.js";
import type { TestApp } from "./setup.js";

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

describe("POST /api/v1/admin/owner", () => {
  it("lets the owner hand over ownership", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/owner", "POST", { newOwner: ALICE }, as(OWNER)),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({ owner: ALICE });
    expect(instance.service.bank.admin.owner).toBe(ALICE);
  });

  it("returns 403 NOT_AUTHORIZED for anyone else", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/owner", "POST", { newOwner: BOB }, as(BOB)),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as { error: unknown };
    expect(body.error).toEqual({
      code: "NOT_AUTHORIZED",
      message: `'${BOB}' is not the owner`,
      details: { caller: BOB },
    });
    expect(instance.service.bank.admin.owner).toBe(OWNER);
  });

  it("the previous owner is locked out after a handover", async () => {
    const { app } = instance;
    await app.request(jsonRequest("/api/v1/admin/owner", "POST", { newOwner: ALICE }, as(OWNER)));

    const res = await app.request(
      jsonRequest("/api/v1/admin/owner", "POST", { newOwner: OWNER }, as(OWNER)),
    );
    expect(res.status).toBe(403);
  });

  it("returns 400 for a malformed address", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/owner", "POST", { newOwner: "0xnope" }, as(OWNER)),
    );
    expect(res.status).toBe(400);
  });
});

describe("POST /api/v1/admin/oracle", () => {
  it("lets the owner repoint the oracle", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/oracle", "POST", { oracleAddress: ORACLE_2 }, as(OWNER)),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({ oracleAddress: ORACLE_2 });
  });

  it("returns 403 for anyone else", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/admin/oracle", "POST", { oracleAddress: ORACLE_2 }, as(ALICE)),
    );
    expect(res.status).toBe(403);
  });
});
