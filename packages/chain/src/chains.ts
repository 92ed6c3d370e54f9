/**
 * Chain Definitions
 *
 * EVM chains the bank can settle on, keyed by CAIP-2 chain ID,
 * and their viem definitions.
 */

import type { ChainId, ChainRef } from "@custody-bank/types";
import type { Chain } from "viem";
import {
  mainnet,
  sepolia,
  base,
  arbitrum,
  optimism,
  polygon,
} from "viem/chains";

// =============================================================================
// Well-Known Chains
// =============================================================================

export const CHAINS = {
  ETHEREUM_MAINNET: {
    chainId: "eip155:1",
    name: "Ethereum Mainnet",
    family: "evm",
  },
  ETHEREUM_SEPOLIA: {
    chainId: "eip155:11155111",
    name: "Ethereum Sepolia",
    family: "evm",
  },
  BASE_MAINNET: {
    chainId: "eip155:8453",
    name: "Base Mainnet",
    family: "evm",
  },
  ARBITRUM_ONE: {
    chainId: "eip155:42161",
    name: "Arbitrum One",
    family: "evm",
  },
  OPTIMISM: {
    chainId: "eip155:10",
    name: "OP Mainnet",
    family: "evm",
  },
  POLYGON: {
    chainId: "eip155:137",
    name: "Polygon PoS",
    family: "evm",
  },
} as const satisfies Record<string, ChainRef>;

const VIEM_CHAINS: Record<string, Chain> = {
  "eip155:1": mainnet,
  "eip155:11155111": sepolia,
  "eip155:8453": base,
  "eip155:42161": arbitrum,
  "eip155:10": optimism,
  "eip155:137": polygon,
};

// =============================================================================
// Helpers
// =============================================================================

const chainMap = new Map<ChainId, ChainRef>(
  Object.values(CHAINS).map((c) => [c.chainId, c])
);

/**
 * Look up a ChainRef by its chainId.
 * Returns undefined if the chain is not known.
 */
export function getChainRef(chainId: ChainId): ChainRef | undefined {
  return chainMap.get(chainId);
}

export function isEvmChain(chainId: ChainId): boolean {
  return chainId.startsWith("eip155:");
}

/**
 * The viem chain for a CAIP-2 ID. Throws for chains the bank does not know.
 */
export function resolveViemChain(chainId: ChainId): Chain {
  const chain = VIEM_CHAINS[chainId];
  if (chain === undefined) {
    throw new Error(
      `Unsupported chain '${chainId}'. ` +
        `Supported: ${Object.keys(VIEM_CHAINS).join(", ")}`
    );
  }
  return chain;
}
