/**
 * EVM Transfer Gateway — native value payouts from the operator account.
 *
 * Sends a plain value transaction and waits for its receipt. Every outcome
 * resolves to a TransferResult; the only way this gateway fails is `ok: false`.
 *
 * Rules:
 * - Submission errors and reverted receipts fail the transfer
 * - Once a hash exists the transaction is broadcast: a receipt wait that
 *   times out or errors reports `pending`, never a failure
 */

import type { Hash, TransactionReceipt } from "viem";
import type { TransferResult, ValueTransferGateway } from "@custody-bank/bank";
import type { Address, Wei } from "@custody-bank/types";
import type { EvmPublicClient, EvmWalletClient } from "./clients.js";

export interface EvmTransferGatewayOptions {
  readonly publicClient: EvmPublicClient;
  readonly walletClient: EvmWalletClient;
  /** How long to wait for a receipt (default 60s) */
  readonly receiptTimeoutMs?: number | undefined;
  /** Blocks to wait on top of inclusion (default 1) */
  readonly confirmations?: number | undefined;
}

export class EvmTransferGateway implements ValueTransferGateway {
  private readonly publicClient: EvmPublicClient;
  private readonly walletClient: EvmWalletClient;
  private readonly receiptTimeoutMs: number;
  private readonly confirmations: number;

  constructor(options: EvmTransferGatewayOptions) {
    this.publicClient = options.publicClient;
    this.walletClient = options.walletClient;
    this.receiptTimeoutMs = options.receiptTimeoutMs ?? 60_000;
    this.confirmations = options.confirmations ?? 1;
  }

  /** Address value is paid from. */
  get operator(): Address {
    return this.walletClient.account.address;
  }

  async send(to: Address, amount: Wei): Promise<TransferResult> {
    let hash: Hash;
    try {
      hash = await this.walletClient.sendTransaction({ to, value: amount });
    } catch (err) {
      return { ok: false, reason: describeError(err) };
    }

    let status: TransactionReceipt["status"];
    try {
      const receipt = await this.publicClient.waitForTransactionReceipt({
        hash,
        confirmations: this.confirmations,
        timeout: this.receiptTimeoutMs,
      });
      status = receipt.status;
    } catch {
      return { ok: true, txHash: hash, pending: true };
    }

    if (status !== "success") {
      return { ok: false, reason: `Transaction ${hash} reverted` };
    }
    return { ok: true, txHash: hash };
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
