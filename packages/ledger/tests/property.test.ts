/**
 * Property-Based Tests for @hashlock/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY operation
 * sequence:
 *
 * 1. totalSupply == sum(balances) after every operation
 * 2. No balance is ever negative
 * 3. Failed operations leave state unchanged
 * 4. Snapshot → restore preserves every balance
 * 5. parseUnits ∘ formatUnits is the identity
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Address } from "@hashlock/types";
import { BalanceLedger } from "../src/balance-ledger.js";
import { formatUnits, parseUnits } from "../src/unit-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACCOUNTS: readonly Address[] = [
  "0x0000000000000000000000000000000000000001",
  "0x0000000000000000000000000000000000000002",
  "0x0000000000000000000000000000000000000003",
  "0x0000000000000000000000000000000000000004",
];

const arbAccount = fc.constantFrom(...ACCOUNTS);
const arbAmount = fc.bigInt({ min: 1n, max: 10n ** 24n });

type Op =
  | { kind: "mint"; account: Address; amount: bigint }
  | { kind: "burn"; account: Address; amount: bigint }
  | { kind: "transfer"; from: Address; to: Address; amount: bigint };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("mint" as const), account: arbAccount, amount: arbAmount }),
  fc.record({ kind: fc.constant("burn" as const), account: arbAccount, amount: arbAmount }),
  fc.record({
    kind: fc.constant("transfer" as const),
    from: arbAccount,
    to: arbAccount,
    amount: arbAmount,
  }),
);

function apply(ledger: BalanceLedger, op: Op): void {
  switch (op.kind) {
    case "mint":
      ledger.mint(op.account, op.amount);
      return;
    case "burn":
      ledger.burn(op.account, op.amount);
      return;
    case "transfer":
      ledger.transfer(op.from, op.to, op.amount);
      return;
  }
}

function balances(ledger: BalanceLedger): bigint[] {
  return ACCOUNTS.map((a) => ledger.balanceOf(a));
}

// =============================================================================
// Properties
// =============================================================================

describe("property: conservation", () => {
  it("supply equals the sum of balances after every operation", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { minLength: 1, maxLength: 40 }), (ops) => {
        const ledger = new BalanceLedger();
        for (const op of ops) {
          try {
            apply(ledger, op);
          } catch {
            // rejected operations are covered by the atomicity property
          }
          const check = ledger.verifyConservation();
          expect(check.valid).toBe(true);
          for (const b of balances(ledger)) {
            expect(b >= 0n).toBe(true);
          }
        }
      }),
      { numRuns: 200 },
    );
  });

  it("a rejected operation changes no balance and no supply", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { minLength: 1, maxLength: 40 }), (ops) => {
        const ledger = new BalanceLedger();
        for (const op of ops) {
          const before = balances(ledger);
          const supplyBefore = ledger.totalSupply;
          try {
            apply(ledger, op);
          } catch {
            expect(balances(ledger)).toEqual(before);
            expect(ledger.totalSupply).toBe(supplyBefore);
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});

describe("property: snapshot", () => {
  it("restore preserves every balance", () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(arbAccount, arbAmount), { minLength: 1, maxLength: 20 }),
        (mints) => {
          const ledger = new BalanceLedger();
          for (const [account, amount] of mints) {
            ledger.mint(account, amount);
          }
          const restored = BalanceLedger.fromSnapshot(ledger.snapshot());
          expect(balances(restored)).toEqual(balances(ledger));
          expect(restored.totalSupply).toBe(ledger.totalSupply);
        },
      ),
      { numRuns: 100 },
    );
  });
});

describe("property: unit conversion", () => {
  it("parseUnits(formatUnits(x)) === x", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: -(10n ** 30n), max: 10n ** 30n }),
        fc.integer({ min: 0, max: 18 }),
        (value, decimals) => {
          expect(parseUnits(formatUnits(value, decimals), decimals)).toBe(value);
        },
      ),
      { numRuns: 200 },
    );
  });
});
