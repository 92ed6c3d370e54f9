/**
 * Chainlink price feed.
 *
 * Reads an AggregatorV3 contract through a viem public client. Read-only:
 * no signing, no state changes.
 */

import { parseAbi } from "viem";
import type { PriceFeed, PriceFeedResolver, PriceRound } from "@custody-bank/bank";
import type { Address } from "@custody-bank/types";
import type { EvmPublicClient } from "./clients.js";

const AGGREGATOR_V3_ABI = parseAbi([
  "function decimals() view returns (uint8)",
  "function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
]);

export class ChainlinkPriceFeed implements PriceFeed {
  readonly address: Address;
  private readonly client: EvmPublicClient;

  constructor(client: EvmPublicClient, address: Address) {
    this.client = client;
    this.address = address;
  }

  async latestRound(): Promise<PriceRound> {
    const [round, decimals] = await Promise.all([
      this.client.readContract({
        address: this.address,
        abi: AGGREGATOR_V3_ABI,
        functionName: "latestRoundData",
      }),
      this.client.readContract({
        address: this.address,
        abi: AGGREGATOR_V3_ABI,
        functionName: "decimals",
      }),
    ]);

    const [, answer, , updatedAt] = round;
    return { answer, decimals, updatedAt };
  }
}

/**
 * Resolve oracle addresses to Chainlink feeds on one chain.
 */
export function chainlinkFeedResolver(client: EvmPublicClient): PriceFeedResolver {
  return (address) => new ChainlinkPriceFeed(client, address);
}
