/**
 * @custody-bank/bank — Reentrancy guard.
 *
 * A two-state latch around operations that move value out of custody.
 * Re-entering a guarded operation while it is active is an error, never a wait.
 */

import { BankError } from "./types.js";

export type LatchState = "NOT_ENTERED" | "ENTERED";

export class ReentrancyGuard {
  private _state: LatchState = "NOT_ENTERED";

  get state(): LatchState {
    return this._state;
  }

  get isEntered(): boolean {
    return this._state === "ENTERED";
  }

  /**
   * Take the latch. Throws REENTRANCY_DETECTED if it is already held.
   */
  enter(): void {
    if (this._state === "ENTERED") {
      throw new BankError(
        "REENTRANCY_DETECTED",
        "Reentrant call to a guarded operation",
        {},
      );
    }
    this._state = "ENTERED";
  }

  /**
   * Release the latch, whatever its state.
   */
  exit(): void {
    this._state = "NOT_ENTERED";
  }

  /**
   * Run `fn` holding the latch; the latch is released on every exit path.
   */
  run<T>(fn: () => T): T {
    this.enter();
    try {
      return fn();
    } finally {
      this.exit();
    }
  }

  /**
   * Async form of `run`: the latch is held until the returned promise settles.
   */
  async runAsync<T>(fn: () => Promise<T>): Promise<T> {
    this.enter();
    try {
      return await fn();
    } finally {
      this.exit();
    }
  }
}
