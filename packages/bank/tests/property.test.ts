/**
 * Property-Based Tests for @custody-bank/bank
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence of
 * operations:
 *
 * 1. Balances always sum to the pool total, which never exceeds the cap
 * 2. A failed operation leaves no trace
 * 3. Counters only move forward, one per committed operation
 * 4. Snapshot → restore → snapshot preserves everything but the timestamp
 * 5. parseUnits/formatUnits round-trip canonical decimals
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Address } from "@custody-bank/types";
import { Ledger } from "../src/ledger.js";
import { InMemoryTransferGateway } from "../src/transfer-gateway.js";
import { isBankError } from "../src/types.js";
import { formatUnits, parseUnits } from "../src/units.js";
import { ALICE, BOB, CAROL } from "./fixtures.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbAccount = fc.constantFrom<Address>(ALICE, BOB, CAROL);

type Operation =
  | { readonly kind: "deposit"; readonly account: Address; readonly amount: bigint }
  | { readonly kind: "withdraw"; readonly account: Address; readonly amount: bigint; readonly fail: boolean };

const arbOperation: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({
    kind: fc.constant("deposit" as const),
    account: arbAccount,
    amount: fc.bigInt({ min: 0n, max: 4_000n }),
  }),
  fc.record({
    kind: fc.constant("withdraw" as const),
    account: arbAccount,
    amount: fc.bigInt({ min: 0n, max: 1_500n }),
    fail: fc.boolean(),
  }),
);

const arbLimits = fc.record({
  withdrawLimit: fc.bigInt({ min: 0n, max: 2_000n }),
  bankCap: fc.bigInt({ min: 0n, max: 20_000n }),
});

// =============================================================================
// Properties
// =============================================================================

describe("Ledger properties", () => {
  it("keeps the pool consistent and rejected operations leave no trace", async () => {
    await fc.assert(
      fc.asyncProperty(arbLimits, fc.array(arbOperation, { maxLength: 40 }), async (limits, operations) => {
        const gateway = new InMemoryTransferGateway();
        const ledger = new Ledger({ ...limits, gateway });

        for (const op of operations) {
          const before = JSON.stringify({ ...ledger.snapshot(), createdAt: "" });
          const statsBefore = ledger.getStats();
          let failed = false;

          if (op.kind === "deposit") {
            try {
              ledger.deposit(op.account, op.amount);
            } catch (err) {
              expect(isBankError(err, "CAPACITY_EXCEEDED")).toBe(true);
              failed = true;
            }
          } else {
            if (op.fail) gateway.failWith("recipient rejected value");
            try {
              await ledger.withdraw(op.account, op.amount);
            } catch (err) {
              expect(isBankError(err)).toBe(true);
              failed = true;
            }
            gateway.recover();
          }

          const report = ledger.verifyInvariants();
          expect(report.errors).toEqual([]);
          expect(ledger.totalBalance <= limits.bankCap).toBe(true);

          const stats = ledger.getStats();
          if (failed) {
            expect(JSON.stringify({ ...ledger.snapshot(), createdAt: "" })).toBe(before);
          } else if (op.kind === "deposit") {
            expect(stats.depositCount).toBe(statsBefore.depositCount + 1n);
            expect(stats.totalBalance).toBe(statsBefore.totalBalance + op.amount);
          } else {
            expect(stats.withdrawalCount).toBe(statsBefore.withdrawalCount + 1n);
            expect(stats.totalBalance).toBe(statsBefore.totalBalance - op.amount);
          }
        }
      }),
      { numRuns: 100 },
    );
  });

  it("snapshot → restore → snapshot is identical", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(arbOperation, { maxLength: 25 }), async (operations) => {
        const gateway = new InMemoryTransferGateway();
        const ledger = new Ledger({ withdrawLimit: 1_000n, bankCap: 200_000n, gateway });

        for (const op of operations) {
          if (op.kind === "deposit") {
            ledger.deposit(op.account, op.amount);
          } else if (op.amount <= ledger.withdrawLimit && op.amount <= ledger.getBalance(op.account)) {
            await ledger.withdraw(op.account, op.amount);
          }
        }

        const snapshot = ledger.snapshot();
        const restored = Ledger.fromSnapshot(snapshot, { gateway });
        expect({ ...restored.snapshot(), createdAt: snapshot.createdAt }).toEqual(snapshot);
      }),
      { numRuns: 50 },
    );
  });
});

describe("Unit conversion properties", () => {
  it("formatUnits then parseUnits is the identity for non-negative values", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 10n ** 30n }), fc.integer({ min: 0, max: 24 }), (value, decimals) => {
        expect(parseUnits(formatUnits(value, decimals), decimals)).toBe(value);
      }),
    );
  });
});
