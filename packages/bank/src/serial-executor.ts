/**
 * @custody-bank/bank — Serial executor.
 *
 * Runs tasks one at a time, in submission order, so that no task observes
 * another's half-applied effects. A task submitted from inside a running
 * task (for example from a callback fired while value is being sent) runs
 * immediately instead of queueing behind its own caller.
 */

import { AsyncLocalStorage } from "node:async_hooks";

export class SerialExecutor {
  private readonly _context = new AsyncLocalStorage<true>();
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /** Tasks queued or running. */
  get pending(): number {
    return this._pending;
  }

  /** Whether the current async context is inside a running task. */
  get inTask(): boolean {
    return this._context.getStore() === true;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    if (this.inTask) {
      return new Promise<T>((resolve) => {
        resolve(task());
      });
    }

    this._pending += 1;
    const result = this._tail.then(() => this._context.run(true, task));
    // The queue moves on after a failed task; the failure reaches the caller through `result`.
    this._tail = result.then(
      () => {
        this._pending -= 1;
      },
      () => {
        this._pending -= 1;
      },
    );
    return result;
  }
}
