/**
 * @custody-bank/bank — Administration state.
 *
 * Holds the owner and the oracle address. Only the current owner may
 * change either. The capability check is an identity comparison; how a
 * caller proves its identity is the transport's concern.
 */

import type { Address } from "@custody-bank/types";
import type { EventPublisher } from "./events.js";
import { BankError } from "./types.js";

export class AdminRegistry {
  private _owner: Address;
  private _oracleAddress: Address;
  private readonly _events: EventPublisher;

  constructor(owner: Address, oracleAddress: Address, events: EventPublisher) {
    this._owner = owner;
    this._oracleAddress = oracleAddress;
    this._events = events;
  }

  get owner(): Address {
    return this._owner;
  }

  get oracleAddress(): Address {
    return this._oracleAddress;
  }

  isOwner(caller: Address): boolean {
    return caller === this._owner;
  }

  /**
   * Throws NOT_AUTHORIZED unless `caller` is the owner.
   */
  assertOwner(caller: Address): void {
    if (!this.isOwner(caller)) {
      throw new BankError(
        "NOT_AUTHORIZED",
        `'${caller}' is not the owner`,
        { caller },
      );
    }
  }

  changeOwner(caller: Address, newOwner: Address): void {
    this.assertOwner(caller);

    const previousOwner = this._owner;
    this._owner = newOwner;

    this._events.publish(
      { type: "bank.owner-changed", payload: { previousOwner, newOwner } },
      caller,
    );
  }

  updateOracleAddress(caller: Address, newAddress: Address): void {
    this.assertOwner(caller);

    this._oracleAddress = newAddress;

    this._events.publish(
      { type: "bank.oracle-updated", payload: { oracleAddress: newAddress } },
      caller,
    );
  }
}
