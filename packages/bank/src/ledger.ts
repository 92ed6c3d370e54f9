/**
 * @custody-bank/bank — Core Ledger class.
 *
 * Custody ledger for a single native currency. Owns every account balance,
 * the pool total, the global counters and each account's history.
 *
 * API surface:
 * - deposit() — Credit the caller, bounded by the pool cap
 * - withdraw() — Debit the caller and pay out through the gateway (guarded)
 * - receive() — Inbound value with no operation selector; a deposit
 * - getBalance() — Balance by address (unknown accounts read 0)
 * - getTransaction() / getHistory() — History queries
 * - verifyInvariants() — Sum-of-balances and cap checks
 * - snapshot() / fromSnapshot() — Persistence
 *
 * Withdrawals follow checks-effects-interactions: every precondition is
 * checked, then the balance, total, counter and history are written, and
 * only then is value sent. If the send fails, the journal undoes the writes.
 */

import { isAddress, isTransactionKind, isWeiString } from "@custody-bank/types";
import type { Address, HistoryRecord, Wei } from "@custody-bank/types";
import { EventPublisher } from "./events.js";
import { Journal } from "./journal.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import type { TransferResult, ValueTransferGateway } from "./transfer-gateway.js";
import type {
  DepositReceipt,
  InvariantReport,
  LedgerLimits,
  LedgerSnapshot,
  LedgerStats,
  WithdrawalReceipt,
} from "./types.js";
import { BankError } from "./types.js";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Collaborators a ledger needs besides its limits.
 */
export interface LedgerDependencies {
  readonly gateway: ValueTransferGateway;
  /** Receives deposit and withdrawal notifications. A private one is created when omitted. */
  readonly events?: EventPublisher | undefined;
  /** Latch for guarded operations. A private one is created when omitted. */
  readonly guard?: ReentrancyGuard | undefined;
}

export interface LedgerOptions extends LedgerLimits, LedgerDependencies {}

interface AccountState {
  balance: Wei;
  readonly history: HistoryRecord[];
}

function assertAmount(amount: Wei): void {
  if (amount < 0n) {
    throw new BankError(
      "INVALID_AMOUNT",
      `Amount must not be negative, got: ${amount.toString()}`,
      { amount: amount.toString() },
    );
  }
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ─── Ledger ──────────────────────────────────────────────────────────────

export class Ledger {
  private readonly _accounts = new Map<Address, AccountState>();
  private readonly _journal = new Journal();
  private readonly _withdrawLimit: Wei;
  private readonly _bankCap: Wei;
  private readonly _gateway: ValueTransferGateway;
  private readonly _events: EventPublisher;
  private readonly _guard: ReentrancyGuard;

  private _totalBalance: Wei = 0n;
  private _depositCount = 0n;
  private _withdrawalCount = 0n;

  constructor(options: LedgerOptions) {
    assertAmount(options.withdrawLimit);
    assertAmount(options.bankCap);

    this._withdrawLimit = options.withdrawLimit;
    this._bankCap = options.bankCap;
    this._gateway = options.gateway;
    this._events = options.events ?? new EventPublisher();
    this._guard = options.guard ?? new ReentrancyGuard();
  }

  // ─── Configuration & Totals ──────────────────────────────────────────

  get withdrawLimit(): Wei {
    return this._withdrawLimit;
  }

  get bankCap(): Wei {
    return this._bankCap;
  }

  get totalBalance(): Wei {
    return this._totalBalance;
  }

  get depositCount(): bigint {
    return this._depositCount;
  }

  get withdrawalCount(): bigint {
    return this._withdrawalCount;
  }

  get guard(): ReentrancyGuard {
    return this._guard;
  }

  getStats(): LedgerStats {
    return {
      totalBalance: this._totalBalance,
      depositCount: this._depositCount,
      withdrawalCount: this._withdrawalCount,
      withdrawLimit: this._withdrawLimit,
      bankCap: this._bankCap,
      accountCount: this._accounts.size,
    };
  }

  // ─── Deposit ─────────────────────────────────────────────────────────

  /**
   * Credit `amount` to `caller`.
   *
   * A zero amount is accepted and still counts as a deposit: the counter
   * advances and a zero record is written.
   */
  deposit(caller: Address, amount: Wei): DepositReceipt {
    assertAmount(amount);

    const newTotal = this._totalBalance + amount;
    if (newTotal > this._bankCap) {
      throw new BankError(
        "CAPACITY_EXCEEDED",
        `Deposit would raise the pool to ${newTotal.toString()}, above the cap of ${this._bankCap.toString()}`,
        { newTotal, bankCap: this._bankCap },
      );
    }

    return this._journal.atomically(() => {
      const account = this._openAccount(caller);
      this._setBalance(account, account.balance + amount);
      this._setTotal(newTotal);

      const index = this._depositCount + 1n;
      this._setDepositCount(index);
      this._appendHistory(account, { index, kind: "deposit", amount });

      const newBalance = account.balance;
      this._journal.defer(() => {
        this._events.publish(
          { type: "bank.deposit", payload: { account: caller, amount, newBalance } },
          caller,
        );
      });

      return { account: caller, amount, newBalance, index };
    });
  }

  /**
   * Value that arrives without naming an operation is a deposit from its sender.
   */
  receive(sender: Address, amount: Wei): DepositReceipt {
    return this.deposit(sender, amount);
  }

  // ─── Withdraw ────────────────────────────────────────────────────────

  /**
   * Debit `amount` from `caller` and send it to `caller`.
   *
   * Precondition order: reentrancy, withdraw limit, balance.
   * The outbound transfer happens after the ledger writes; a failed
   * transfer rolls them back and throws TRANSFER_FAILED.
   */
  async withdraw(caller: Address, amount: Wei): Promise<WithdrawalReceipt> {
    assertAmount(amount);

    return this._guard.runAsync(async () => {
      if (amount > this._withdrawLimit) {
        throw new BankError(
          "LIMIT_EXCEEDED",
          `Withdrawal of ${amount.toString()} exceeds the limit of ${this._withdrawLimit.toString()}`,
          { amount, withdrawLimit: this._withdrawLimit },
        );
      }

      const balance = this.getBalance(caller);
      if (amount > balance) {
        throw new BankError(
          "INSUFFICIENT_FUNDS",
          `'${caller}' has ${balance.toString()}, cannot withdraw ${amount.toString()}`,
          { account: caller, amount, balance },
        );
      }

      return this._journal.atomicallyAsync(async () => {
        const account = this._openAccount(caller);
        this._setBalance(account, account.balance - amount);
        this._setTotal(this._totalBalance - amount);

        const index = this._withdrawalCount + 1n;
        this._setWithdrawalCount(index);
        this._appendHistory(account, { index, kind: "withdrawal", amount });

        let result: TransferResult;
        try {
          result = await this._gateway.send(caller, amount);
        } catch (err) {
          throw this._transferFailed(caller, amount, describeError(err), err);
        }
        if (!result.ok) {
          throw this._transferFailed(caller, amount, result.reason);
        }

        const txHash = result.txHash;
        const newBalance = account.balance;
        this._journal.defer(() => {
          this._events.publish(
            {
              type: "bank.withdrawal",
              payload: { account: caller, amount, newBalance, txHash },
            },
            caller,
          );
        });

        return result.pending === true
          ? { account: caller, amount, newBalance, index, txHash, pending: true }
          : { account: caller, amount, newBalance, index, txHash };
      });
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Balance of `account`; accounts that never transacted read 0.
   */
  getBalance(account: Address): Wei {
    return this._accounts.get(account)?.balance ?? 0n;
  }

  /**
   * Amount recorded under `index` in `account`'s history.
   *
   * Deposit and withdrawal keys come from separate global counters, so one
   * key can be written twice for the same account; the latest write wins.
   */
  getTransaction(account: Address, index: bigint): Wei | undefined {
    const history = this._accounts.get(account)?.history ?? [];
    for (let i = history.length - 1; i >= 0; i--) {
      const record = history[i];
      if (record !== undefined && record.index === index) {
        return record.amount;
      }
    }
    return undefined;
  }

  /**
   * Every history record of `account`, in the order written.
   */
  getHistory(account: Address): readonly HistoryRecord[] {
    return [...(this._accounts.get(account)?.history ?? [])];
  }

  getAccounts(): readonly Address[] {
    return [...this._accounts.keys()];
  }

  hasAccount(account: Address): boolean {
    return this._accounts.has(account);
  }

  /**
   * Check the pool invariants: balances sum to the total, nothing is
   * negative, and the total is within the cap.
   */
  verifyInvariants(): InvariantReport {
    const errors: string[] = [];
    let sum = 0n;

    for (const [address, account] of this._accounts) {
      if (account.balance < 0n) {
        errors.push(`Negative balance for '${address}': ${account.balance.toString()}`);
      }
      sum += account.balance;
    }

    if (sum !== this._totalBalance) {
      errors.push(
        `Sum of balances ${sum.toString()} does not equal total balance ${this._totalBalance.toString()}`,
      );
    }
    if (this._totalBalance > this._bankCap) {
      errors.push(
        `Total balance ${this._totalBalance.toString()} exceeds cap ${this._bankCap.toString()}`,
      );
    }

    return { valid: errors.length === 0, errors };
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with Ledger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      withdrawLimit: this._withdrawLimit.toString(),
      bankCap: this._bankCap.toString(),
      totalBalance: this._totalBalance.toString(),
      depositCount: this._depositCount.toString(),
      withdrawalCount: this._withdrawalCount.toString(),
      accounts: [...this._accounts].map(([address, account]) => ({
        address,
        balance: account.balance.toString(),
        history: account.history.map((record) => ({
          index: record.index.toString(),
          kind: record.kind,
          amount: record.amount.toString(),
        })),
      })),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Throws INVALID_SNAPSHOT unless the snapshot satisfies every invariant.
   */
  static fromSnapshot(snapshot: LedgerSnapshot, dependencies: LedgerDependencies): Ledger {
    const invalid = (reason: string): BankError<"INVALID_SNAPSHOT"> =>
      new BankError("INVALID_SNAPSHOT", `Invalid ledger snapshot: ${reason}`, { reason });

    if (snapshot.version !== 1) {
      throw invalid(`unsupported version ${String(snapshot.version)}`);
    }

    const scalars = {
      withdrawLimit: snapshot.withdrawLimit,
      bankCap: snapshot.bankCap,
      totalBalance: snapshot.totalBalance,
      depositCount: snapshot.depositCount,
      withdrawalCount: snapshot.withdrawalCount,
    };
    for (const [field, value] of Object.entries(scalars)) {
      if (!isWeiString(value)) {
        throw invalid(`${field} is not a non-negative integer: "${String(value)}"`);
      }
    }

    const ledger = new Ledger({
      ...dependencies,
      withdrawLimit: BigInt(snapshot.withdrawLimit),
      bankCap: BigInt(snapshot.bankCap),
    });
    const depositCount = BigInt(snapshot.depositCount);
    const withdrawalCount = BigInt(snapshot.withdrawalCount);

    for (const entry of snapshot.accounts) {
      if (!isAddress(entry.address)) {
        throw invalid(`malformed address "${String(entry.address)}"`);
      }
      if (ledger._accounts.has(entry.address)) {
        throw invalid(`duplicate account '${entry.address}'`);
      }
      if (!isWeiString(entry.balance)) {
        throw invalid(`balance of '${entry.address}' is not a non-negative integer`);
      }

      const history: HistoryRecord[] = [];
      for (const record of entry.history) {
        if (!isWeiString(record.index) || !isWeiString(record.amount) || !isTransactionKind(record.kind)) {
          throw invalid(`malformed history record for '${entry.address}'`);
        }
        const index = BigInt(record.index);
        const limit = record.kind === "deposit" ? depositCount : withdrawalCount;
        if (index === 0n || index > limit) {
          throw invalid(
            `${record.kind} index ${record.index} for '${entry.address}' is outside 1..${limit.toString()}`,
          );
        }
        history.push({ index, kind: record.kind, amount: BigInt(record.amount) });
      }

      ledger._accounts.set(entry.address, { balance: BigInt(entry.balance), history });
    }

    ledger._totalBalance = BigInt(snapshot.totalBalance);
    ledger._depositCount = depositCount;
    ledger._withdrawalCount = withdrawalCount;

    const report = ledger.verifyInvariants();
    if (!report.valid) {
      throw invalid(report.errors.join("; "));
    }

    return ledger;
  }

  // ─── Journaled Writes ────────────────────────────────────────────────

  private _openAccount(address: Address): AccountState {
    const existing = this._accounts.get(address);
    if (existing !== undefined) {
      return existing;
    }

    const account: AccountState = { balance: 0n, history: [] };
    this._accounts.set(address, account);
    this._journal.record(() => {
      this._accounts.delete(address);
    });
    return account;
  }

  private _setBalance(account: AccountState, balance: Wei): void {
    const previous = account.balance;
    account.balance = balance;
    this._journal.record(() => {
      account.balance = previous;
    });
  }

  private _setTotal(total: Wei): void {
    const previous = this._totalBalance;
    this._totalBalance = total;
    this._journal.record(() => {
      this._totalBalance = previous;
    });
  }

  private _setDepositCount(count: bigint): void {
    const previous = this._depositCount;
    this._depositCount = count;
    this._journal.record(() => {
      this._depositCount = previous;
    });
  }

  private _setWithdrawalCount(count: bigint): void {
    const previous = this._withdrawalCount;
    this._withdrawalCount = count;
    this._journal.record(() => {
      this._withdrawalCount = previous;
    });
  }

  private _appendHistory(account: AccountState, record: HistoryRecord): void {
    account.history.push(record);
    this._journal.record(() => {
      account.history.pop();
    });
  }

  private _transferFailed(
    to: Address,
    amount: Wei,
    reason: string,
    cause?: unknown,
  ): BankError<"TRANSFER_FAILED"> {
    return new BankError(
      "TRANSFER_FAILED",
      `Transfer of ${amount.toString()} to '${to}' failed: ${reason}`,
      { to, amount, reason },
      cause !== undefined ? { cause } : undefined,
    );
  }
}
