/**
 * Settlement wiring.
 *
 * Chooses the price feed and the payout gateway from configuration:
 * - RPC_URL set → Chainlink feeds on that chain
 * - RPC_URL and OPERATOR_PRIVATE_KEY set → on-chain payouts
 * - otherwise → in-memory payouts, and STATIC_PRICE (if any) as the feed
 */

import {
  InMemoryTransferGateway,
  StaticPriceFeed,
} from "@custody-bank/bank";
import type { PriceFeedResolver, ValueTransferGateway } from "@custody-bank/bank";
import {
  EvmTransferGateway,
  chainlinkFeedResolver,
  createEvmPublicClient,
  createEvmWalletClient,
} from "@custody-bank/chain";
import type { AppConfig } from "../config.js";

export interface Settlement {
  readonly gateway: ValueTransferGateway;
  readonly priceFeeds: PriceFeedResolver;
  /** "evm" when payouts settle on chain */
  readonly mode: "evm" | "in-memory";
}

type SettlementConfig = Pick<
  AppConfig,
  "CHAIN_ID" | "RPC_URL" | "OPERATOR_PRIVATE_KEY" | "TRANSFER_TIMEOUT_MS" | "STATIC_PRICE"
>;

export function createSettlement(config: SettlementConfig): Settlement {
  if (config.RPC_URL === undefined) {
    const staticPrice = config.STATIC_PRICE;
    const priceFeeds: PriceFeedResolver =
      staticPrice !== undefined
        ? () => new StaticPriceFeed(staticPrice)
        : () => {
            throw new Error("No price feed configured (set RPC_URL or STATIC_PRICE)");
          };
    return { gateway: new InMemoryTransferGateway(), priceFeeds, mode: "in-memory" };
  }

  const connection = {
    chainId: config.CHAIN_ID,
    rpcUrl: config.RPC_URL,
    timeoutMs: config.TRANSFER_TIMEOUT_MS,
  };
  const publicClient = createEvmPublicClient(connection);
  const priceFeeds = chainlinkFeedResolver(publicClient);

  if (config.OPERATOR_PRIVATE_KEY === undefined) {
    return { gateway: new InMemoryTransferGateway(), priceFeeds, mode: "in-memory" };
  }

  const gateway = new EvmTransferGateway({
    publicClient,
    walletClient: createEvmWalletClient(connection, config.OPERATOR_PRIVATE_KEY),
    receiptTimeoutMs: config.TRANSFER_TIMEOUT_MS,
  });
  return { gateway, priceFeeds, mode: "evm" };
}
