/**
 * @custody-bank/bank — Bank composition root.
 *
 * Wires the ledger, administration state and price oracle together and
 * puts every operation behind one serial executor. Transports (the HTTP
 * node, scripts, tests) talk to a Bank, never to the parts directly.
 */

import { NATIVE_DECIMALS } from "@custody-bank/types";
import type {
  Address,
  BankEventListener,
  HistoryRecord,
  Wei,
} from "@custody-bank/types";
import { AdminRegistry } from "./admin-registry.js";
import { EventPublisher } from "./events.js";
import type { ListenerErrorHandler } from "./events.js";
import { Ledger } from "./ledger.js";
import { PriceOracleClient, quoteValue } from "./price-oracle.js";
import type { PriceFeedResolver, PriceQuote } from "./price-oracle.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import { SerialExecutor } from "./serial-executor.js";
import type { ValueTransferGateway } from "./transfer-gateway.js";
import type {
  DepositReceipt,
  InvariantReport,
  LedgerSnapshot,
  LedgerStats,
  WithdrawalReceipt,
} from "./types.js";
import { rescale } from "./units.js";

// =============================================================================
// Configuration
// =============================================================================

export interface BankConfig {
  readonly withdrawLimit: Wei;
  readonly bankCap: Wei;
  readonly owner: Address;
  readonly oracleAddress: Address;
  readonly gateway: ValueTransferGateway;
  readonly priceFeeds: PriceFeedResolver;
  /** Restore ledger state instead of starting empty; limits come from the snapshot */
  readonly snapshot?: LedgerSnapshot | undefined;
  /** ISO timestamp source for event metadata */
  readonly clock?: (() => string) | undefined;
  /** Told about subscribers that throw; they never affect an operation */
  readonly onListenerError?: ListenerErrorHandler | undefined;
}

export interface BankStats extends LedgerStats {
  readonly owner: Address;
  readonly oracleAddress: Address;
}

export interface QuoteValuation {
  readonly account: Address;
  readonly balance: Wei;
  /** Balance valued in the quote currency, at `decimals` precision */
  readonly value: bigint;
  readonly decimals: number;
  readonly price: PriceQuote;
}

// =============================================================================
// Bank
// =============================================================================

export class Bank {
  readonly ledger: Ledger;
  readonly admin: AdminRegistry;
  readonly oracle: PriceOracleClient;
  readonly events: EventPublisher;
  readonly guard: ReentrancyGuard;

  private readonly _executor = new SerialExecutor();

  constructor(config: BankConfig) {
    this.events = new EventPublisher(config.clock, config.onListenerError);
    this.guard = new ReentrancyGuard();

    const dependencies = {
      gateway: config.gateway,
      events: this.events,
      guard: this.guard,
    };
    this.ledger =
      config.snapshot !== undefined
        ? Ledger.fromSnapshot(config.snapshot, dependencies)
        : new Ledger({
            ...dependencies,
            withdrawLimit: config.withdrawLimit,
            bankCap: config.bankCap,
          });

    this.admin = new AdminRegistry(config.owner, config.oracleAddress, this.events);
    this.oracle = new PriceOracleClient(config.priceFeeds, () => this.admin.oracleAddress);
  }

  subscribe(listener: BankEventListener): () => void {
    return this.events.subscribe(listener);
  }

  // ─── Ledger Operations ─────────────────────────────────────────────

  deposit(caller: Address, amount: Wei): Promise<DepositReceipt> {
    return this._executor.run(() => this.ledger.deposit(caller, amount));
  }

  withdraw(caller: Address, amount: Wei): Promise<WithdrawalReceipt> {
    return this._executor.run(() => this.ledger.withdraw(caller, amount));
  }

  receive(sender: Address, amount: Wei): Promise<DepositReceipt> {
    return this._executor.run(() => this.ledger.receive(sender, amount));
  }

  getBalance(account: Address): Promise<Wei> {
    return this._executor.run(() => this.ledger.getBalance(account));
  }

  getHistory(account: Address): Promise<readonly HistoryRecord[]> {
    return this._executor.run(() => this.ledger.getHistory(account));
  }

  getStats(): Promise<BankStats> {
    return this._executor.run(() => ({
      ...this.ledger.getStats(),
      owner: this.admin.owner,
      oracleAddress: this.admin.oracleAddress,
    }));
  }

  verifyInvariants(): Promise<InvariantReport> {
    return this._executor.run(() => this.ledger.verifyInvariants());
  }

  snapshot(): Promise<LedgerSnapshot> {
    return this._executor.run(() => this.ledger.snapshot());
  }

  // ─── Administration ────────────────────────────────────────────────

  changeOwner(caller: Address, newOwner: Address): Promise<void> {
    return this._executor.run(() => this.admin.changeOwner(caller, newOwner));
  }

  updateOracleAddress(caller: Address, newAddress: Address): Promise<void> {
    return this._executor.run(() => this.admin.updateOracleAddress(caller, newAddress));
  }

  // ─── Valuation ─────────────────────────────────────────────────────

  getPrice(): Promise<PriceQuote> {
    return this.oracle.latestPrice();
  }

  /**
   * Value an account's balance in the quote currency.
   *
   * The balance is read first, then the price is fetched outside the
   * executor so a slow feed never holds up deposits and withdrawals.
   */
  async getQuoteValue(
    account: Address,
    quoteDecimals: number = NATIVE_DECIMALS,
  ): Promise<QuoteValuation> {
    const balance = await this.getBalance(account);
    const price = await this.oracle.latestPrice();
    const value = rescale(quoteValue(balance, price.price), NATIVE_DECIMALS, quoteDecimals);

    return { account, balance, value, decimals: quoteDecimals, price };
  }
}
