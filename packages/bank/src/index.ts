/**
 * @custody-bank/bank — Custody ledger engine.
 *
 * Per-account balances for a single native currency, with:
 * - A per-withdrawal limit and a pool-wide cap
 * - Checks-effects-interactions withdrawals behind a reentrancy guard
 * - All-or-nothing state changes (a failed payout rolls back)
 * - Owner-gated administration and price-feed valuation
 * - Serialized operations through the Bank facade
 */

// Facade
export { Bank } from "./bank.js";
export type { BankConfig, BankStats, QuoteValuation } from "./bank.js";

// Core
export { Ledger } from "./ledger.js";
export type { LedgerDependencies, LedgerOptions } from "./ledger.js";
export { AdminRegistry } from "./admin-registry.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";
export type { LatchState } from "./reentrancy-guard.js";
export { Journal } from "./journal.js";
export { SerialExecutor } from "./serial-executor.js";
export { EventPublisher } from "./events.js";
export type { BankEventDraft, ListenerErrorHandler } from "./events.js";

// Collaborators
export { InMemoryTransferGateway } from "./transfer-gateway.js";
export type { Payout, TransferResult, ValueTransferGateway } from "./transfer-gateway.js";
export { PriceOracleClient, StaticPriceFeed, quoteValue } from "./price-oracle.js";
export type { PriceFeed, PriceFeedResolver, PriceQuote, PriceRound } from "./price-oracle.js";

// Units
export {
  WEI_PER_ETHER,
  rescale,
  toMajorUnit,
  fromMajorUnit,
  parseUnits,
  formatUnits,
} from "./units.js";

// Types & errors
export { BankError, isBankError } from "./types.js";
export type {
  BankErrorCode,
  BankErrorDetails,
  LedgerLimits,
  DepositReceipt,
  WithdrawalReceipt,
  LedgerStats,
  InvariantReport,
  HistoryRecordSnapshot,
  AccountSnapshot,
  LedgerSnapshot,
} from "./types.js";
