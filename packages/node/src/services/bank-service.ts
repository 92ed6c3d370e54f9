/**
 * BankService — Composition root for the node.
 *
 * Route handlers delegate to this service; they never build bank
 * components themselves. Keeps a bounded in-memory log of the bank's
 * events for the events endpoint.
 */

import { Bank } from "@custody-bank/bank";
import type {
  LedgerSnapshot,
  ListenerErrorHandler,
  PriceFeedResolver,
  ValueTransferGateway,
} from "@custody-bank/bank";
import type { Address, BankEvent, BankEventListener, Wei } from "@custody-bank/types";

// =============================================================================
// Configuration
// =============================================================================

export interface BankServiceConfig {
  readonly withdrawLimit: Wei;
  readonly bankCap: Wei;
  readonly owner: Address;
  readonly oracleAddress: Address;
  readonly gateway: ValueTransferGateway;
  readonly priceFeeds: PriceFeedResolver;
  readonly snapshot?: LedgerSnapshot | undefined;
  /** Events kept for GET /api/v1/events (default 1000) */
  readonly eventLogCapacity?: number | undefined;
  readonly clock?: (() => string) | undefined;
  readonly onListenerError?: ListenerErrorHandler | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class BankService {
  readonly bank: Bank;

  private readonly _events: BankEvent[] = [];
  private readonly _capacity: number;

  constructor(config: BankServiceConfig) {
    this.bank = new Bank(config);
    this._capacity = config.eventLogCapacity ?? 1000;

    this.bank.subscribe((event) => {
      this._events.push(event);
      if (this._events.length > this._capacity) {
        this._events.shift();
      }
    });
  }

  /**
   * The most recent events, oldest first.
   */
  recentEvents(limit?: number): readonly BankEvent[] {
    return limit === undefined ? [...this._events] : this._events.slice(-limit);
  }

  onEvent(listener: BankEventListener): () => void {
    return this.bank.subscribe(listener);
  }

  /**
   * Ready when the ledger invariants hold.
   */
  async checkReady(): Promise<{ readonly ready: boolean; readonly errors: readonly string[] }> {
    const report = await this.bank.verifyInvariants();
    return { ready: report.valid, errors: report.errors };
  }
}
