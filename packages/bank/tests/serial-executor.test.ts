/**
 * Tests for the serial executor.
 */

import { describe, it, expect } from "vitest";
import { SerialExecutor } from "../src/serial-executor.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SerialExecutor", () => {
  it("runs tasks one at a time in submission order", async () => {
    const executor = new SerialExecutor();
    const log: string[] = [];
    const gate = deferred();

    const first = executor.run(async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
      return 1;
    });
    const second = executor.run(() => {
      log.push("second");
      return 2;
    });

    await Promise.resolve();
    expect(executor.pending).toBe(2);
    gate.resolve();

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
    expect(executor.pending).toBe(0);
  });

  it("keeps going after a failed task", async () => {
    const executor = new SerialExecutor();

    const failed = executor.run(() => {
      throw new Error("task failed");
    });
    const next = executor.run(() => "after");

    await expect(failed).rejects.toThrow("task failed");
    await expect(next).resolves.toBe("after");
  });

  it("runs a nested task immediately instead of queueing it", async () => {
    const executor = new SerialExecutor();
    const log: string[] = [];

    const outer = executor.run(async () => {
      expect(executor.inTask).toBe(true);
      log.push("outer:start");
      const inner = await executor.run(async () => {
        log.push("inner");
        return "inner-result";
      });
      log.push("outer:end");
      return inner;
    });

    await expect(outer).resolves.toBe("inner-result");
    expect(log).toEqual(["outer:start", "inner", "outer:end"]);
    expect(executor.inTask).toBe(false);
  });

  it("a nested task that throws rejects without breaking the queue", async () => {
    const executor = new SerialExecutor();

    const outer = executor.run(async () => {
      await expect(
        executor.run(() => {
          throw new Error("nested");
        }),
      ).rejects.toThrow("nested");
      return "survived";
    });

    await expect(outer).resolves.toBe("survived");
    await expect(executor.run(() => 3)).resolves.toBe(3);
  });
});
