/**
 * @custody-bank/bank — Unit conversion.
 *
 * All arithmetic uses bigint, so nothing wraps around.
 *
 * Rules:
 * - No floating-point operations
 * - Shrinking precision truncates; the remainder is discarded, not an error
 * - Decimals must be non-negative integers
 */

import { NATIVE_DECIMALS } from "@custody-bank/types";
import type { Wei } from "@custody-bank/types";
import { BankError } from "./types.js";

/** Minor units (wei) per major unit (ether). */
export const WEI_PER_ETHER: bigint = 10n ** BigInt(NATIVE_DECIMALS);

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new BankError(
      "INVALID_DECIMALS",
      `Decimals must be a non-negative integer, got: ${String(decimals)}`,
      { decimals },
    );
  }
}

/**
 * Move an integer amount from one decimal precision to another.
 *
 * rescale(100n, 6, 18)          → 100_000_000_000_000n
 * rescale(100_000_000_000_000n, 18, 6) → 100n
 * rescale(1_999n, 3, 0)         → 1n  (fraction discarded)
 */
export function rescale(amount: bigint, fromDecimals: number, toDecimals: number): bigint {
  assertDecimals(fromDecimals);
  assertDecimals(toDecimals);

  if (fromDecimals === toDecimals) {
    return amount;
  }
  if (fromDecimals > toDecimals) {
    return amount / 10n ** BigInt(fromDecimals - toDecimals);
  }
  return amount * 10n ** BigInt(toDecimals - fromDecimals);
}

/**
 * Wei to whole ether, truncating.
 *
 * Lossy: toMajorUnit(fromMajorUnit(x)) === x, but
 * fromMajorUnit(toMajorUnit(x)) drops everything below one ether.
 */
export function toMajorUnit(amountMinor: Wei): bigint {
  return amountMinor / WEI_PER_ETHER;
}

/**
 * Whole ether to wei.
 */
export function fromMajorUnit(amountMajor: bigint): Wei {
  return amountMajor * WEI_PER_ETHER;
}

/**
 * Parse a non-negative decimal string into an integer scaled by decimals.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * "100" with decimals=6  → 100000000n
 */
export function parseUnits(text: string, decimals: number): bigint {
  assertDecimals(decimals);
  const trimmed = text.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new BankError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`, {
      amount: trimmed,
    });
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new BankError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
      { amount: trimmed },
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Render a scaled integer as a decimal string without trailing zeros.
 *
 * 1500000000000000000n with decimals=18 → "1.5"
 * 1000000000000000000n with decimals=18 → "1"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatUnits(value: bigint, decimals: number): string {
  assertDecimals(decimals);
  if (decimals === 0) {
    return value.toString();
  }

  const negative = value < 0n;
  const abs = negative ? -value : value;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals).replace(/0+$/, "");
  const result = fracPart === "" ? intPart : `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}
