/**
 * Financial Types
 *
 * Primitives for custody accounting of a native chain currency.
 *
 * Rules:
 * - Amounts are bigint in the minor unit (wei); never floating point
 * - Amounts cross serialization boundaries as decimal strings
 * - Accounts are identified by their address, nothing else
 */

/**
 * An EVM-style account address ("0x" followed by 40 hex digits).
 */
export type Address = `0x${string}`;

/**
 * An amount in the smallest indivisible denomination (wei).
 */
export type Wei = bigint;

/**
 * Decimal string form of a Wei amount, used in snapshots and API payloads.
 */
export type WeiString = string;

/** Decimal places of the custodied native currency. */
export const NATIVE_DECIMALS = 18;

/** Decimal places of the quote currency price published by the feed. */
export const PRICE_FEED_DECIMALS = 8;

/**
 * Which side of the custody pool a history record moved value to.
 */
export type TransactionKind = "deposit" | "withdrawal";

/**
 * A single record in an account's transaction history.
 *
 * `index` is the value of the global deposit or withdrawal counter at the
 * time of the write, so indices in one account's history are not contiguous.
 */
export interface HistoryRecord {
  readonly index: bigint;
  readonly kind: TransactionKind;
  readonly amount: Wei;
}
