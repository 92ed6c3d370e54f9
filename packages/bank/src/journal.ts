/**
 * @custody-bank/bank — Undo journal.
 *
 * Gives ledger operations an all-or-nothing boundary. Each mutation records
 * how to undo itself; a unit that throws is rolled back in reverse order.
 * Deferred effects (notifications) run only once the outermost unit has
 * committed, outside its rollback boundary.
 *
 * A unit opened while another is active joins it as a savepoint: if the
 * inner unit throws, only its own records are undone, and its deferred
 * effects wait for the outer commit. This is how a deposit made from inside
 * a withdrawal's outbound transfer becomes part of that withdrawal.
 *
 * The journal assumes a single writer. Concurrent callers must be serialized
 * before they reach it.
 */

interface Frame {
  readonly undo: (() => void)[];
  readonly deferred: (() => void)[];
}

export class Journal {
  private _frame: Frame | undefined;

  /** Whether an atomic unit is currently open. */
  get active(): boolean {
    return this._frame !== undefined;
  }

  /**
   * Register the inverse of a mutation that has just been applied.
   */
  record(undo: () => void): void {
    this._requireFrame("record").undo.push(undo);
  }

  /**
   * Register an effect to run once the outermost unit commits.
   */
  defer(effect: () => void): void {
    this._requireFrame("defer").deferred.push(effect);
  }

  /**
   * Run `fn` as an atomic unit.
   */
  atomically<T>(fn: () => T): T {
    const enclosing = this._frame;
    if (enclosing !== undefined) {
      const mark = this._mark(enclosing);
      try {
        return fn();
      } catch (err) {
        this._rollbackTo(enclosing, mark);
        throw err;
      }
    }

    const frame: Frame = { undo: [], deferred: [] };
    this._frame = frame;
    let result: T;
    try {
      result = fn();
    } catch (err) {
      this._rollbackTo(frame, { undo: 0, deferred: 0 });
      throw err;
    } finally {
      this._frame = undefined;
    }

    this._flush(frame);
    return result;
  }

  /**
   * Async form of `atomically`. The unit stays open across awaits.
   */
  async atomicallyAsync<T>(fn: () => Promise<T>): Promise<T> {
    const enclosing = this._frame;
    if (enclosing !== undefined) {
      const mark = this._mark(enclosing);
      try {
        return await fn();
      } catch (err) {
        this._rollbackTo(enclosing, mark);
        throw err;
      }
    }

    const frame: Frame = { undo: [], deferred: [] };
    this._frame = frame;
    let result: T;
    try {
      result = await fn();
    } catch (err) {
      this._rollbackTo(frame, { undo: 0, deferred: 0 });
      throw err;
    } finally {
      this._frame = undefined;
    }

    this._flush(frame);
    return result;
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _requireFrame(operation: string): Frame {
    if (this._frame === undefined) {
      throw new Error(`Journal.${operation}() called outside an atomic unit`);
    }
    return this._frame;
  }

  private _mark(frame: Frame): { undo: number; deferred: number } {
    return { undo: frame.undo.length, deferred: frame.deferred.length };
  }

  private _rollbackTo(frame: Frame, mark: { undo: number; deferred: number }): void {
    while (frame.undo.length > mark.undo) {
      const undo = frame.undo.pop();
      undo?.();
    }
    frame.deferred.length = mark.deferred;
  }

  // Runs after commit: nothing a deferred effect does can undo the unit.
  private _flush(frame: Frame): void {
    for (const effect of frame.deferred) {
      effect();
    }
  }
}
