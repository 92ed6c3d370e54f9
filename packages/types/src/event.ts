/**
 * Event Types
 *
 * Notifications emitted by the bank for observability.
 * Nothing inside the bank consumes them; correctness never depends on them.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (which, when, who)
 * - Discriminated by `type`
 */

import type { Address, Wei } from "./financial.js";

/**
 * Metadata common to all bank events.
 */
export interface EventMetadata {
  /** Sequence number of the event within one bank, starting at 1 */
  readonly sequence: number;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address whose call caused this event */
  readonly actor: Address;
}

export interface DepositEvent {
  readonly type: "bank.deposit";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly account: Address;
    readonly amount: Wei;
    readonly newBalance: Wei;
  };
}

export interface WithdrawalEvent {
  readonly type: "bank.withdrawal";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly account: Address;
    readonly amount: Wei;
    readonly newBalance: Wei;
    readonly txHash?: string | undefined;
  };
}

export interface OwnerChangedEvent {
  readonly type: "bank.owner-changed";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly previousOwner: Address;
    readonly newOwner: Address;
  };
}

export interface OracleUpdatedEvent {
  readonly type: "bank.oracle-updated";
  readonly metadata: EventMetadata;
  readonly payload: {
    readonly oracleAddress: Address;
  };
}

/**
 * Any notification emitted by the bank.
 */
export type BankEvent =
  | DepositEvent
  | WithdrawalEvent
  | OwnerChangedEvent
  | OracleUpdatedEvent;

export type BankEventType = BankEvent["type"];

/**
 * Receives bank events synchronously, after the state change they describe.
 */
export type BankEventListener = (event: BankEvent) => void;
