/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Requests carry wei amounts as decimal strings; responses render every
 * bigint the same way, since JSON has no integer type wide enough.
 */

import { getAddress, isAddress, type Address } from "viem";
import { z } from "zod";
import { formatUnits } from "@custody-bank/bank";
import type {
  BankStats,
  DepositReceipt,
  PriceQuote,
  QuoteValuation,
  WithdrawalReceipt,
} from "@custody-bank/bank";
import type { BankEvent, HistoryRecord } from "@custody-bank/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const WeiAmountSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "Amount must be a non-negative integer in wei")
  .max(78, "Amount is too large")
  .transform((v) => BigInt(v));

export const AddressSchema = z
  .string()
  .refine((v) => isAddress(v), "Invalid address")
  .transform((v): Address => getAddress(v));

// =============================================================================
// Request DTOs
// =============================================================================

export const DepositSchema = z.object({
  amount: WeiAmountSchema,
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawalSchema = z.object({
  amount: WeiAmountSchema,
});

export type WithdrawalDto = z.infer<typeof WithdrawalSchema>;

export const ChangeOwnerSchema = z.object({
  newOwner: AddressSchema,
});

export type ChangeOwnerDto = z.infer<typeof ChangeOwnerSchema>;

export const UpdateOracleSchema = z.object({
  oracleAddress: AddressSchema,
});

export type UpdateOracleDto = z.infer<typeof UpdateOracleSchema>;

export const ValueQuerySchema = z.object({
  decimals: z.coerce.number().int().min(0).max(36).optional(),
});

export type ValueQuery = z.infer<typeof ValueQuerySchema>;

export const ListEventsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export interface DepositResponseDto {
  readonly account: Address;
  readonly amount: string;
  readonly newBalance: string;
  readonly index: string;
}

export interface WithdrawalResponseDto extends DepositResponseDto {
  readonly txHash: string | null;
  /** Payout broadcast but not yet confirmed */
  readonly pending: boolean;
}

export interface BankStatsDto {
  readonly totalBalance: string;
  readonly depositCount: string;
  readonly withdrawalCount: string;
  readonly withdrawLimit: string;
  readonly bankCap: string;
  readonly accountCount: number;
  readonly owner: Address;
  readonly oracleAddress: Address;
}

export interface HistoryRecordDto {
  readonly index: string;
  readonly kind: HistoryRecord["kind"];
  readonly amount: string;
}

export interface PriceDto {
  readonly price: string;
  readonly decimals: number;
  readonly oracle: Address;
  readonly updatedAt: string | null;
}

export interface ValuationDto {
  readonly account: Address;
  readonly balance: string;
  readonly value: string;
  /** `value` rendered as a decimal number */
  readonly formatted: string;
  readonly decimals: number;
  readonly price: PriceDto;
}

export interface EventDto {
  readonly type: BankEvent["type"];
  readonly metadata: BankEvent["metadata"];
  readonly payload: Record<string, string | null>;
}

// =============================================================================
// Mappers
// =============================================================================

export function toDepositDto(receipt: DepositReceipt): DepositResponseDto {
  return {
    account: receipt.account,
    amount: receipt.amount.toString(),
    newBalance: receipt.newBalance.toString(),
    index: receipt.index.toString(),
  };
}

export function toWithdrawalDto(receipt: WithdrawalReceipt): WithdrawalResponseDto {
  return {
    account: receipt.account,
    amount: receipt.amount.toString(),
    newBalance: receipt.newBalance.toString(),
    index: receipt.index.toString(),
    txHash: receipt.txHash ?? null,
    pending: receipt.pending === true,
  };
}

export function toBankStatsDto(stats: BankStats): BankStatsDto {
  return {
    totalBalance: stats.totalBalance.toString(),
    depositCount: stats.depositCount.toString(),
    withdrawalCount: stats.withdrawalCount.toString(),
    withdrawLimit: stats.withdrawLimit.toString(),
    bankCap: stats.bankCap.toString(),
    accountCount: stats.accountCount,
    owner: stats.owner,
    oracleAddress: stats.oracleAddress,
  };
}

export function toHistoryDto(records: readonly HistoryRecord[]): readonly HistoryRecordDto[] {
  return records.map((record) => ({
    index: record.index.toString(),
    kind: record.kind,
    amount: record.amount.toString(),
  }));
}

export function toPriceDto(quote: PriceQuote): PriceDto {
  return {
    price: quote.price.toString(),
    decimals: quote.decimals,
    oracle: quote.oracle,
    updatedAt: quote.updatedAt ?? null,
  };
}

export function toValuationDto(valuation: QuoteValuation): ValuationDto {
  return {
    account: valuation.account,
    balance: valuation.balance.toString(),
    value: valuation.value.toString(),
    formatted: formatUnits(valuation.value, valuation.decimals),
    decimals: valuation.decimals,
    price: toPriceDto(valuation.price),
  };
}

export function toEventDto(event: BankEvent): EventDto {
  const payload: Record<string, string | null> = {};
  for (const [key, raw] of Object.entries(event.payload)) {
    const value: unknown = raw;
    payload[key] =
      typeof value === "bigint" ? value.toString() : typeof value === "string" ? value : null;
  }
  return { type: event.type, metadata: event.metadata, payload };
}
