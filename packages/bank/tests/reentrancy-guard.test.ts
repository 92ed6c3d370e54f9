/**
 * Tests for the reentrancy latch.
 */

import { describe, it, expect } from "vitest";
import { ReentrancyGuard } from "../src/reentrancy-guard.js";
import { isBankError } from "../src/types.js";

describe("ReentrancyGuard", () => {
  it("starts NOT_ENTERED", () => {
    const guard = new ReentrancyGuard();
    expect(guard.state).toBe("NOT_ENTERED");
    expect(guard.isEntered).toBe(false);
  });

  it("enter/exit toggles the latch", () => {
    const guard = new ReentrancyGuard();
    guard.enter();
    expect(guard.state).toBe("ENTERED");
    guard.exit();
    expect(guard.state).toBe("NOT_ENTERED");
  });

  it("a second enter throws REENTRANCY_DETECTED", () => {
    const guard = new ReentrancyGuard();
    guard.enter();
    let caught: unknown;
    try {
      guard.enter();
    } catch (err) {
      caught = err;
    }
    expect(isBankError(caught, "REENTRANCY_DETECTED")).toBe(true);
    expect(guard.isEntered).toBe(true);
  });

  it("run releases the latch after success and failure", () => {
    const guard = new ReentrancyGuard();
    expect(guard.run(() => 7)).toBe(7);
    expect(guard.isEntered).toBe(false);

    expect(() =>
      guard.run(() => {
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(guard.isEntered).toBe(false);
  });

  it("run rejects nested entry", () => {
    const guard = new ReentrancyGuard();
    expect(() => guard.run(() => guard.run(() => 1))).toThrow(
      "Reentrant call to a guarded operation",
    );
    expect(guard.isEntered).toBe(false);
  });

  it("runAsync holds the latch until the promise settles", async () => {
    const guard = new ReentrancyGuard();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const pending = guard.runAsync(async () => {
      await gate;
      return "done";
    });
    expect(guard.isEntered).toBe(true);

    await expect(guard.runAsync(async () => "nested")).rejects.toMatchObject({
      code: "REENTRANCY_DETECTED",
    });

    release();
    await expect(pending).resolves.toBe("done");
    expect(guard.isEntered).toBe(false);
  });

  it("runAsync releases the latch after a rejection", async () => {
    const guard = new ReentrancyGuard();
    await expect(
      guard.runAsync(async () => {
        throw new Error("nope");
      }),
    ).rejects.toThrow("nope");
    expect(guard.isEntered).toBe(false);
  });
});
