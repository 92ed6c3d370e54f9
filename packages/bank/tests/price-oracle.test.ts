/**
 * Tests for price-feed valuation.
 */

import { describe, it, expect } from "vitest";
import type { Address } from "@custody-bank/types";
import {
  PriceOracleClient,
  StaticPriceFeed,
  quoteValue,
} from "../src/price-oracle.js";
import type { PriceFeed } from "../src/price-oracle.js";
import { isBankError } from "../src/types.js";
import { ORACLE, ORACLE_2 } from "./fixtures.js";

const ONE_ETHER = 1_000_000_000_000_000_000n;

function clientFor(feeds: Map<Address, PriceFeed>, oracle: () => Address = () => ORACLE) {
  return new PriceOracleClient((address) => {
    const feed = feeds.get(address);
    if (feed === undefined) {
      throw new Error(`no feed at ${address}`);
    }
    return feed;
  }, oracle);
}

describe("quoteValue", () => {
  it("multiplies by the price and divides by 10^8", () => {
    // 2 ether at 2000.00000000
    expect(quoteValue(2n * ONE_ETHER, 200_000_000_000n)).toBe(4000n * ONE_ETHER);
  });

  it("truncates", () => {
    expect(quoteValue(1n, 50_000_000n)).toBe(0n);
    expect(quoteValue(3n, 50_000_000n)).toBe(1n);
  });
});

describe("PriceOracleClient", () => {
  it("returns the latest answer at 8 decimals", async () => {
    const client = clientFor(new Map([[ORACLE, new StaticPriceFeed(250_000_000_000n)]]));
    const quote = await client.latestPrice();

    expect(quote).toEqual({
      price: 250_000_000_000n,
      decimals: 8,
      oracle: ORACLE,
      updatedAt: undefined,
    });
  });

  it("normalizes feeds with other precisions", async () => {
    const client = clientFor(new Map([[ORACLE, new StaticPriceFeed(2_500_000_000_000_000_000_000n, 18)]]));
    expect((await client.latestPrice()).price).toBe(250_000_000_000n);
  });

  it("reports the feed's update time as ISO 8601", async () => {
    const feed: PriceFeed = {
      latestRound: async () => ({ answer: 1n, decimals: 8, updatedAt: 1_705_312_800n }),
    };
    const client = clientFor(new Map([[ORACLE, feed]]));
    expect((await client.latestPrice()).updatedAt).toBe("2024-01-15T10:00:00.000Z");
  });

  it("passes a negative answer through unchanged", async () => {
    const client = clientFor(new Map([[ORACLE, new StaticPriceFeed(-5n)]]));
    expect((await client.latestPrice()).price).toBe(-5n);
  });

  it("wraps feed failures as ORACLE_UNAVAILABLE", async () => {
    const cause = new Error("execution reverted");
    const feed: PriceFeed = {
      latestRound: async () => {
        throw cause;
      },
    };
    const client = clientFor(new Map([[ORACLE, feed]]));

    let caught: unknown;
    try {
      await client.latestPrice();
    } catch (err) {
      caught = err;
    }

    expect(isBankError(caught, "ORACLE_UNAVAILABLE")).toBe(true);
    expect(caught).toMatchObject({
      message: `Price feed at ${ORACLE} is unavailable: execution reverted`,
      details: { oracle: ORACLE, reason: "execution reverted" },
      cause,
    });
  });

  it("wraps an out-of-range update time as ORACLE_UNAVAILABLE", async () => {
    const feed: PriceFeed = {
      latestRound: async () => ({ answer: 1n, decimals: 8, updatedAt: 10n ** 15n }),
    };
    const client = clientFor(new Map([[ORACLE, feed]]));

    await expect(client.latestPrice()).rejects.toMatchObject({
      code: "ORACLE_UNAVAILABLE",
      details: { oracle: ORACLE },
    });
  });

  it("wraps resolver failures as ORACLE_UNAVAILABLE", async () => {
    const client = clientFor(new Map(), () => ORACLE_2);
    await expect(client.latestPrice()).rejects.toMatchObject({
      code: "ORACLE_UNAVAILABLE",
      details: { oracle: ORACLE_2, reason: `no feed at ${ORACLE_2}` },
    });
  });

  it("follows the oracle address on every query", async () => {
    let current: Address = ORACLE;
    const client = clientFor(
      new Map<Address, PriceFeed>([
        [ORACLE, new StaticPriceFeed(100n)],
        [ORACLE_2, new StaticPriceFeed(200n)],
      ]),
      () => current,
    );

    expect((await client.latestPrice()).price).toBe(100n);
    current = ORACLE_2;
    expect(client.oracleAddress).toBe(ORACLE_2);
    expect((await client.latestPrice()).price).toBe(200n);
  });

  it("values wei in the quote currency", async () => {
    const feed = new StaticPriceFeed(200_000_000_000n);
    const client = clientFor(new Map([[ORACLE, feed]]));

    expect(await client.getValueInQuoteCurrency(ONE_ETHER / 2n)).toBe(1000n * ONE_ETHER);
    expect(await client.getValueInQuoteCurrency(ONE_ETHER / 2n, 2)).toBe(100_000n);

    feed.setAnswer(300_000_000_000n);
    expect(await client.getValueInQuoteCurrency(ONE_ETHER, 0)).toBe(3000n);
  });
});
