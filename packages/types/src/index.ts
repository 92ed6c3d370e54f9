/**
 * @custody-bank/types — Shared domain types for the custody bank.
 *
 * These types are used across all custody-bank packages:
 * - Financial primitives (addresses, wei amounts, history records)
 * - Chain references
 * - Bank notifications
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Address,
  Wei,
  WeiString,
  TransactionKind,
  HistoryRecord,
} from "./financial.js";

export { NATIVE_DECIMALS, PRICE_FEED_DECIMALS } from "./financial.js";

// Chain types
export type {
  ChainId,
  ChainRef,
  TxHash,
} from "./chain.js";

// Event types
export type {
  EventMetadata,
  DepositEvent,
  WithdrawalEvent,
  OwnerChangedEvent,
  OracleUpdatedEvent,
  BankEvent,
  BankEventType,
  BankEventListener,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isWeiString,
  isTransactionKind,
  isHistoryRecord,
  isEventMetadata,
  isBankEvent,
  isChainRef,
} from "./guards.js";
