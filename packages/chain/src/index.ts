/**
 * @custody-bank/chain — EVM settlement adapters.
 *
 * - Chainlink AggregatorV3 price feeds
 * - Native value payouts from an operator account
 * - viem client construction for known chains
 */

export {
  CHAINS,
  getChainRef,
  isEvmChain,
  resolveViemChain,
} from "./chains.js";

export {
  createEvmPublicClient,
  createEvmWalletClient,
} from "./clients.js";
export type {
  EvmConnectionConfig,
  EvmPublicClient,
  EvmWalletClient,
} from "./clients.js";

export { ChainlinkPriceFeed, chainlinkFeedResolver } from "./chainlink-feed.js";

export { EvmTransferGateway } from "./evm-transfer-gateway.js";
export type { EvmTransferGatewayOptions } from "./evm-transfer-gateway.js";
