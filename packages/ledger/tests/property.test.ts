/**
 * Property-Based Tests for @keelway/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY sequence
 * of operations:
 *
 * 1. Balances never go negative
 * 2. available + withdrawing never exceeds what was credited
 * 3. Snapshot → restore → snapshot is identical
 * 4. reduceBalance never removes more than requested
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Address } from "@keelway/types";
import { BalanceLedger } from "../src/ledger.js";
import { ManualBlockClock } from "../src/block-clock.js";
import { WithdrawalDelay } from "../src/withdrawal-delay.js";
import { LedgerError } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const TOKEN: Address = "0x00000000000000000000000000000000000000c1";
const DEPOSITOR: Address = "0x00000000000000000000000000000000000000a1";

type Op =
  | { readonly kind: "credit"; readonly amount: bigint }
  | { readonly kind: "withdraw"; readonly amount: bigint }
  | { readonly kind: "reduce"; readonly amount: bigint }
  | { readonly kind: "empty" }
  | { readonly kind: "tick"; readonly blocks: bigint };

const arbAmount = fc.bigInt({ min: 0n, max: 1_000_000n });

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  arbAmount.map((amount) => ({ kind: "credit" as const, amount })),
  arbAmount.map((amount) => ({ kind: "withdraw" as const, amount })),
  arbAmount.map((amount) => ({ kind: "reduce" as const, amount })),
  fc.constant({ kind: "empty" as const }),
  fc.bigInt({ min: 0n, max: 20n }).map((blocks) => ({ kind: "tick" as const, blocks })),
);

function freshLedger(): { ledger: BalanceLedger; clock: ManualBlockClock } {
  const clock = new ManualBlockClock();
  const ledger = new BalanceLedger(clock, new WithdrawalDelay(clock, 5n));
  return { ledger, clock };
}

/** Apply an op; expected ledger refusals are ignored. Returns the amount credited. */
function apply(ledger: BalanceLedger, clock: ManualBlockClock, op: Op): bigint {
  try {
    switch (op.kind) {
      case "credit":
        ledger.increaseAvailable(TOKEN, DEPOSITOR, op.amount);
        return op.amount;
      case "withdraw":
        ledger.moveToWithdrawing(TOKEN, DEPOSITOR, op.amount);
        return 0n;
      case "reduce":
        ledger.reduceBalance(TOKEN, DEPOSITOR, op.amount);
        return 0n;
      case "empty":
        ledger.emptyWithdrawing(TOKEN, DEPOSITOR);
        return 0n;
      case "tick":
        clock.advance(op.blocks);
        return 0n;
    }
  } catch (err) {
    if (err instanceof LedgerError) return 0n;
    throw err;
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("ledger conservation", () => {
  it("balances stay non-negative and within what was credited", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const { ledger, clock } = freshLedger();
        let credited = 0n;
        for (const op of ops) {
          credited += apply(ledger, clock, op);
          const available = ledger.availableBalance(TOKEN, DEPOSITOR);
          const withdrawing = ledger.withdrawingBalance(TOKEN, DEPOSITOR);
          expect(available >= 0n).toBe(true);
          expect(withdrawing >= 0n).toBe(true);
          expect(available + withdrawing <= credited).toBe(true);
          expect(ledger.withdrawableBalance(TOKEN, DEPOSITOR) <= withdrawing).toBe(true);
        }
      }),
    );
  });

  it("reduceBalance removes at most the requested amount", () => {
    fc.assert(
      fc.property(arbAmount, arbAmount, arbAmount, (credit, withdraw, request) => {
        const { ledger, clock } = freshLedger();
        apply(ledger, clock, { kind: "credit", amount: credit });
        apply(ledger, clock, { kind: "withdraw", amount: withdraw });
        const before = ledger.totalBalance(TOKEN, DEPOSITOR);

        const debit = ledger.reduceBalance(TOKEN, DEPOSITOR, request);
        const removed = debit.fromAvailable + debit.fromWithdrawing;

        expect(removed).toBe(request < before ? request : before);
        expect(ledger.totalBalance(TOKEN, DEPOSITOR)).toBe(before - removed);
      }),
    );
  });
});

describe("snapshot", () => {
  it("snapshot → restore → snapshot is identical", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 20 }), (ops) => {
        const { ledger, clock } = freshLedger();
        for (const op of ops) apply(ledger, clock, op);
        const first = ledger.snapshot();

        const { ledger: other } = freshLedger();
        other.restore(first);
        expect(other.snapshot()).toEqual(first);
      }),
    );
  });
});
