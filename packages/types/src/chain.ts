/**
 * Chain Types
 *
 * Chain-agnostic references for the settlement layer.
 *
 * Rules:
 * - Chain IDs follow the CAIP-2 convention ("eip155:1")
 * - Transaction hashes are opaque strings
 */

/**
 * Chain identifier (e.g., "eip155:1" for Ethereum mainnet).
 */
export type ChainId = string;

/**
 * Transaction hash on a specific chain.
 */
export type TxHash = string;

/**
 * Reference to a specific chain.
 */
export interface ChainRef {
  /** Chain identifier */
  readonly chainId: ChainId;

  /** Human-readable chain name */
  readonly name: string;

  /** Chain family; only "evm" chains are settled today */
  readonly family: string;
}
