/**
 * @custody-bank/bank — Internal types for the custody engine.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Every error carries the structured data of the failed precondition
 */

import type {
  Address,
  HistoryRecord,
  TransactionKind,
  Wei,
  WeiString,
} from "@custody-bank/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/**
 * Structured context carried by each error code.
 */
export interface BankErrorDetails {
  readonly CAPACITY_EXCEEDED: { readonly newTotal: Wei; readonly bankCap: Wei };
  readonly LIMIT_EXCEEDED: { readonly amount: Wei; readonly withdrawLimit: Wei };
  readonly INSUFFICIENT_FUNDS: {
    readonly account: Address;
    readonly amount: Wei;
    readonly balance: Wei;
  };
  readonly TRANSFER_FAILED: {
    readonly to: Address;
    readonly amount: Wei;
    readonly reason: string;
  };
  readonly REENTRANCY_DETECTED: Readonly<Record<string, never>>;
  readonly NOT_AUTHORIZED: { readonly caller: Address };
  readonly ORACLE_UNAVAILABLE: { readonly oracle: Address; readonly reason: string };
  readonly INVALID_AMOUNT: { readonly amount: string };
  readonly INVALID_DECIMALS: { readonly decimals: number };
  readonly INVALID_SNAPSHOT: { readonly reason: string };
}

/** Error codes for bank operations. */
export type BankErrorCode = keyof BankErrorDetails;

/**
 * Structured error from the custody engine.
 * Always thrown — never returned as a code.
 */
export class BankError<C extends BankErrorCode = BankErrorCode> extends Error {
  public readonly code: C;
  public readonly details: BankErrorDetails[C];

  constructor(
    code: C,
    message: string,
    details: BankErrorDetails[C],
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "BankError";
    this.code = code;
    this.details = details;
  }

  /**
   * Narrow to a specific error code.
   */
  is<K extends BankErrorCode>(code: K): this is BankError<K> {
    const current: BankErrorCode = this.code;
    return current === code;
  }
}

/**
 * Check whether an unknown thrown value is a BankError, optionally of one code.
 */
export function isBankError<K extends BankErrorCode>(
  value: unknown,
  code?: K,
): value is BankError<K> {
  if (!(value instanceof BankError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

// ─── Ledger Configuration ────────────────────────────────────────────────

/**
 * Immutable limits fixed at construction.
 */
export interface LedgerLimits {
  /** Largest amount a single withdrawal may move (wei) */
  readonly withdrawLimit: Wei;
  /** Largest total the custody pool may hold (wei) */
  readonly bankCap: Wei;
}

// ─── Operation Results ───────────────────────────────────────────────────

/**
 * Result of a committed deposit.
 */
export interface DepositReceipt {
  readonly account: Address;
  readonly amount: Wei;
  readonly newBalance: Wei;
  /** History key the deposit was recorded under */
  readonly index: bigint;
}

/**
 * Result of a committed withdrawal.
 */
export interface WithdrawalReceipt {
  readonly account: Address;
  readonly amount: Wei;
  readonly newBalance: Wei;
  /** History key the withdrawal was recorded under */
  readonly index: bigint;
  /** Settlement transaction hash, when the gateway reports one */
  readonly txHash?: string | undefined;
  /** Set when the payout was broadcast but its confirmation was not observed */
  readonly pending?: boolean | undefined;
}

/**
 * Pool-wide figures.
 */
export interface LedgerStats {
  readonly totalBalance: Wei;
  readonly depositCount: bigint;
  readonly withdrawalCount: bigint;
  readonly withdrawLimit: Wei;
  readonly bankCap: Wei;
  readonly accountCount: number;
}

/**
 * Outcome of an invariant check.
 */
export interface InvariantReport {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface HistoryRecordSnapshot {
  readonly index: WeiString;
  readonly kind: TransactionKind;
  readonly amount: WeiString;
}

export interface AccountSnapshot {
  readonly address: Address;
  readonly balance: WeiString;
  readonly history: readonly HistoryRecordSnapshot[];
}

/**
 * Serializable snapshot of the entire ledger state.
 * Amounts and counters are decimal strings so the snapshot survives JSON.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly withdrawLimit: WeiString;
  readonly bankCap: WeiString;
  readonly totalBalance: WeiString;
  readonly depositCount: WeiString;
  readonly withdrawalCount: WeiString;
  readonly accounts: readonly AccountSnapshot[];
  readonly createdAt: string;
}

export type { HistoryRecord };
