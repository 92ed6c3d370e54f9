/**
 * @custody-bank/bank — Value transfer gateway.
 *
 * The only way value leaves custody. Implementations report failure as a
 * value so the ledger can turn it into a typed error and roll back.
 */

import type { Address, Wei } from "@custody-bank/types";

export type TransferResult =
  | {
      readonly ok: true;
      readonly txHash?: string | undefined;
      /** Broadcast, but not yet confirmed. The value must be treated as gone. */
      readonly pending?: boolean | undefined;
    }
  | { readonly ok: false; readonly reason: string };

export interface ValueTransferGateway {
  /**
   * Move `amount` of custodied value to `to`.
   * Must resolve (never hang) and should not reject; a rejection is treated
   * the same as `{ ok: false }`. Report `ok: false` only when no value can
   * have left; a transfer that may still land is `ok: true, pending: true`.
   */
  send(to: Address, amount: Wei): Promise<TransferResult>;
}

/**
 * A payout accepted by the in-memory gateway.
 */
export interface Payout {
  readonly to: Address;
  readonly amount: Wei;
  readonly txHash: string;
}

/**
 * In-process gateway. Records payouts instead of settling them on a chain.
 * Used by tests and by the node when no operator key is configured.
 */
export class InMemoryTransferGateway implements ValueTransferGateway {
  private readonly _payouts: Payout[] = [];
  private _failure: string | undefined;

  async send(to: Address, amount: Wei): Promise<TransferResult> {
    if (this._failure !== undefined) {
      return { ok: false, reason: this._failure };
    }

    const txHash = `0x${(this._payouts.length + 1).toString(16).padStart(64, "0")}`;
    this._payouts.push({ to, amount, txHash });
    return { ok: true, txHash };
  }

  /** Make every following send fail with `reason`. */
  failWith(reason: string): void {
    this._failure = reason;
  }

  /** Undo `failWith`. */
  recover(): void {
    this._failure = undefined;
  }

  get payouts(): readonly Payout[] {
    return [...this._payouts];
  }
}
