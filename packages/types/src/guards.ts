/**
 * Runtime Type Guards
 *
 * Narrowing functions for bank domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized snapshots, chain responses).
 */

import type { Address, HistoryRecord, TransactionKind, WeiString } from "./financial.js";
import type { BankEvent, EventMetadata } from "./event.js";
import type { ChainRef } from "./chain.js";

// =============================================================================
// Financial guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const WEI_PATTERN = /^(0|[1-9]\d*)$/;
const TRANSACTION_KINDS = new Set<string>(["deposit", "withdrawal"]);

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * A non-negative integer in canonical decimal form (no sign, no leading zeros).
 */
export function isWeiString(value: unknown): value is WeiString {
  return typeof value === "string" && WEI_PATTERN.test(value);
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && TRANSACTION_KINDS.has(value);
}

export function isHistoryRecord(value: unknown): value is HistoryRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.index === "bigint" &&
    v.index > 0n &&
    isTransactionKind(v.kind) &&
    typeof v.amount === "bigint" &&
    v.amount >= 0n
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_TYPES = new Set<string>([
  "bank.deposit",
  "bank.withdrawal",
  "bank.owner-changed",
  "bank.oracle-updated",
]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.sequence === "number" &&
    Number.isInteger(v.sequence) &&
    v.sequence > 0 &&
    typeof v.timestamp === "string" &&
    isAddress(v.actor)
  );
}

export function isBankEvent(value: unknown): value is BankEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    EVENT_TYPES.has(v.type) &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

// =============================================================================
// Chain guards
// =============================================================================

export function isChainRef(value: unknown): value is ChainRef {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.chainId === "string" &&
    v.chainId.length > 0 &&
    typeof v.name === "string" &&
    typeof v.family === "string"
  );
}
