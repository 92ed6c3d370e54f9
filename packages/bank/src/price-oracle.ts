/**
 * @custody-bank/bank — Price oracle client.
 *
 * Values custodied wei in an external quote currency using the latest
 * answer of a price feed. The feed is an injected capability, resolved
 * from the oracle address each time so that repointing takes effect on
 * the next query.
 *
 * Rules:
 * - Prices are signed integers with PRICE_FEED_DECIMALS (8) decimals
 * - Valuation truncates toward zero; that loss is not an error
 * - Any feed failure surfaces as ORACLE_UNAVAILABLE
 */

import { NATIVE_DECIMALS, PRICE_FEED_DECIMALS } from "@custody-bank/types";
import type { Address, Wei } from "@custody-bank/types";
import { BankError } from "./types.js";
import { rescale } from "./units.js";

// =============================================================================
// Feed Interface
// =============================================================================

/**
 * One answer from a price feed.
 */
export interface PriceRound {
  /** Signed price scaled by `decimals` */
  readonly answer: bigint;
  readonly decimals: number;
  /** Unix seconds of the last update, when the feed reports it */
  readonly updatedAt?: bigint | undefined;
}

export interface PriceFeed {
  latestRound(): Promise<PriceRound>;
}

/**
 * Resolves the feed that lives at an oracle address.
 */
export type PriceFeedResolver = (address: Address) => PriceFeed;

/**
 * A price normalized to PRICE_FEED_DECIMALS.
 */
export interface PriceQuote {
  readonly price: bigint;
  readonly decimals: typeof PRICE_FEED_DECIMALS;
  readonly oracle: Address;
  /** ISO 8601 timestamp of the feed's last update, when known */
  readonly updatedAt?: string | undefined;
}

const PRICE_SCALE = 10n ** BigInt(PRICE_FEED_DECIMALS);

/**
 * Value `amountMinor` at `price` (8 decimals): amountMinor * price / 10^8.
 * The result keeps the precision of `amountMinor`.
 */
export function quoteValue(amountMinor: Wei, price: bigint): bigint {
  return (amountMinor * price) / PRICE_SCALE;
}

// =============================================================================
// Client
// =============================================================================

export class PriceOracleClient {
  private readonly _resolveFeed: PriceFeedResolver;
  private readonly _oracleAddress: () => Address;

  constructor(resolveFeed: PriceFeedResolver, oracleAddress: () => Address) {
    this._resolveFeed = resolveFeed;
    this._oracleAddress = oracleAddress;
  }

  get oracleAddress(): Address {
    return this._oracleAddress();
  }

  /**
   * Latest price from the configured oracle.
   */
  async latestPrice(): Promise<PriceQuote> {
    const oracle = this._oracleAddress();

    let round: PriceRound;
    let updatedAt: string | undefined;
    try {
      round = await this._resolveFeed(oracle).latestRound();
      updatedAt =
        round.updatedAt !== undefined
          ? new Date(Number(round.updatedAt) * 1000).toISOString()
          : undefined;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new BankError(
        "ORACLE_UNAVAILABLE",
        `Price feed at ${oracle} is unavailable: ${reason}`,
        { oracle, reason },
        { cause: err },
      );
    }

    return {
      price: rescale(round.answer, round.decimals, PRICE_FEED_DECIMALS),
      decimals: PRICE_FEED_DECIMALS,
      oracle,
      updatedAt,
    };
  }

  /**
   * Value a wei amount in the quote currency.
   *
   * Without `quoteDecimals` the result has the precision of the input (18);
   * with it, the result is rescaled (truncating) to that precision.
   */
  async getValueInQuoteCurrency(amountMinor: Wei, quoteDecimals?: number): Promise<bigint> {
    const { price } = await this.latestPrice();
    const value = quoteValue(amountMinor, price);
    return quoteDecimals === undefined
      ? value
      : rescale(value, NATIVE_DECIMALS, quoteDecimals);
  }
}

// =============================================================================
// Static Feed
// =============================================================================

/**
 * A feed with a fixed, settable answer. For tests and local runs.
 */
export class StaticPriceFeed implements PriceFeed {
  private _answer: bigint;
  private readonly _decimals: number;

  constructor(answer: bigint, decimals: number = PRICE_FEED_DECIMALS) {
    this._answer = answer;
    this._decimals = decimals;
  }

  setAnswer(answer: bigint): void {
    this._answer = answer;
  }

  async latestRound(): Promise<PriceRound> {
    return { answer: this._answer, decimals: this._decimals };
  }
}
