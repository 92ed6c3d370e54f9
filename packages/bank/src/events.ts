/**
 * @custody-bank/bank — Event publisher.
 *
 * Stamps bank notifications with a sequence number, timestamp and actor,
 * then hands them to every subscribed listener in subscription order.
 *
 * Listeners observe; they never decide. A listener that throws is reported
 * to `onListenerError` and the remaining listeners still run.
 */

import type {
  Address,
  BankEvent,
  BankEventListener,
} from "@custody-bank/types";

/**
 * Receives the error of a listener that threw while handling `event`.
 */
export type ListenerErrorHandler = (err: unknown, event: BankEvent) => void;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * A bank event before the publisher has stamped its metadata.
 */
export type BankEventDraft = DistributiveOmit<BankEvent, "metadata">;

export class EventPublisher {
  private readonly _listeners = new Set<BankEventListener>();
  private readonly _clock: () => string;
  private readonly _onListenerError: ListenerErrorHandler | undefined;
  private _sequence = 0;
  private _failedDeliveries = 0;

  constructor(
    clock: () => string = () => new Date().toISOString(),
    onListenerError?: ListenerErrorHandler,
  ) {
    this._clock = clock;
    this._onListenerError = onListenerError;
  }

  /**
   * Subscribe to all events. Returns an unsubscribe function.
   */
  subscribe(listener: BankEventListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  /**
   * Number of events published so far.
   */
  get sequence(): number {
    return this._sequence;
  }

  /**
   * Number of listener calls that threw.
   */
  get failedDeliveries(): number {
    return this._failedDeliveries;
  }

  publish(draft: BankEventDraft, actor: Address): BankEvent {
    this._sequence += 1;
    const event: BankEvent = {
      ...draft,
      metadata: {
        sequence: this._sequence,
        timestamp: this._clock(),
        actor,
      },
    };

    for (const listener of this._listeners) {
      try {
        listener(event);
      } catch (err) {
        this._failedDeliveries += 1;
        this._onListenerError?.(err, event);
      }
    }

    return event;
  }
}
