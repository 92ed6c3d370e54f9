/**
 * viem client construction.
 *
 * One public client per chain is shared by every feed and by the transfer
 * gateway. A wallet client exists only when an operator key is configured.
 */

import {
  createPublicClient,
  createWalletClient,
  http,
  type Chain,
  type Hex,
  type HttpTransport,
  type PublicClient,
  type WalletClient,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { resolveViemChain } from "./chains.js";

export interface EvmConnectionConfig {
  /** CAIP-2 chain ID, e.g. "eip155:1" */
  readonly chainId: string;
  readonly rpcUrl: string;
  /** Per-request RPC timeout (default 30s) */
  readonly timeoutMs?: number | undefined;
}

export type EvmPublicClient = PublicClient<HttpTransport, Chain>;
export type EvmWalletClient = WalletClient<HttpTransport, Chain, PrivateKeyAccount>;

export function createEvmPublicClient(config: EvmConnectionConfig): EvmPublicClient {
  return createPublicClient({
    chain: resolveViemChain(config.chainId),
    transport: http(config.rpcUrl, { timeout: config.timeoutMs ?? 30_000 }),
  });
}

/**
 * Wallet client signing with the operator key.
 */
export function createEvmWalletClient(
  config: EvmConnectionConfig,
  privateKey: Hex,
): EvmWalletClient {
  return createWalletClient({
    account: privateKeyToAccount(privateKey),
    chain: resolveViemChain(config.chainId),
    transport: http(config.rpcUrl, { timeout: config.timeoutMs ?? 30_000 }),
  });
}
