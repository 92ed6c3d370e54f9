/**
 * Tests for owner-gated administration.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { BankEvent } from "@custody-bank/types";
import { AdminRegistry } from "../src/admin-registry.js";
import { EventPublisher } from "../src/events.js";
import { isBankError } from "../src/types.js";
import { ALICE, BOB, ORACLE, ORACLE_2, OWNER, fixedClock } from "./fixtures.js";

describe("AdminRegistry", () => {
  let events: BankEvent[];
  let publisher: EventPublisher;
  let admin: AdminRegistry;

  beforeEach(() => {
    events = [];
    publisher = new EventPublisher(fixedClock);
    publisher.subscribe((event) => events.push(event));
    admin = new AdminRegistry(OWNER, ORACLE, publisher);
  });

  it("exposes the initial owner and oracle", () => {
    expect(admin.owner).toBe(OWNER);
    expect(admin.oracleAddress).toBe(ORACLE);
    expect(admin.isOwner(OWNER)).toBe(true);
    expect(admin.isOwner(ALICE)).toBe(false);
  });

  it("the owner can hand over ownership", () => {
    admin.changeOwner(OWNER, ALICE);

    expect(admin.owner).toBe(ALICE);
    expect(admin.isOwner(OWNER)).toBe(false);
    expect(events).toEqual([
      {
        type: "bank.owner-changed",
        metadata: { sequence: 1, timestamp: "2024-01-15T10:00:00.000Z", actor: OWNER },
        payload: { previousOwner: OWNER, newOwner: ALICE },
      },
    ]);
  });

  it("a non-owner cannot change the owner", () => {
    let caught: unknown;
    try {
      admin.changeOwner(BOB, BOB);
    } catch (err) {
      caught = err;
    }

    expect(isBankError(caught, "NOT_AUTHORIZED")).toBe(true);
    expect(caught).toMatchObject({
      message: `'${BOB}' is not the owner`,
      details: { caller: BOB },
    });
    expect(admin.owner).toBe(OWNER);
    expect(events).toEqual([]);
  });

  it("the previous owner loses its rights after a handover", () => {
    admin.changeOwner(OWNER, ALICE);
    expect(() => admin.updateOracleAddress(OWNER, ORACLE_2)).toThrow(/is not the owner/);
    admin.updateOracleAddress(ALICE, ORACLE_2);
    expect(admin.oracleAddress).toBe(ORACLE_2);
  });

  it("the owner can repoint the oracle", () => {
    admin.updateOracleAddress(OWNER, ORACLE_2);

    expect(admin.oracleAddress).toBe(ORACLE_2);
    expect(events[0]).toMatchObject({
      type: "bank.oracle-updated",
      payload: { oracleAddress: ORACLE_2 },
    });
  });

  it("a non-owner cannot repoint the oracle", () => {
    expect(() => admin.updateOracleAddress(ALICE, ORACLE_2)).toThrow(/is not the owner/);
    expect(admin.oracleAddress).toBe(ORACLE);
  });

  it("compares addresses exactly, without case folding", () => {
    const registry = new AdminRegistry(ALICE, ORACLE, publisher);
    expect(registry.isOwner("0x00000000000000000000000000000000000000a1")).toBe(true);
    expect(registry.isOwner("0x00000000000000000000000000000000000000A1")).toBe(false);
  });

  it("keeps the change when a listener throws", () => {
    publisher.subscribe(() => {
      throw new Error("listener failed");
    });

    admin.updateOracleAddress(OWNER, ORACLE_2);
    admin.changeOwner(OWNER, ALICE);

    expect(admin.oracleAddress).toBe(ORACLE_2);
    expect(admin.owner).toBe(ALICE);
    expect(publisher.failedDeliveries).toBe(2);
  });
});
