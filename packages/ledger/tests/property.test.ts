/**
 * Property-Based Tests for @ignition/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Balances always sum to the total supply
 * 2. A failed operation never changes state
 * 3. The unlimited allowance is never decremented
 * 4. parseUnits / formatUnits roundtrip
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Notification } from "@ignition/types";
import {
  allowanceOf,
  approve,
  balanceOf,
  cloneLedgerState,
  createLedgerState,
  transfer,
  transferFrom,
} from "../src/ledger.js";
import { computeSupplyReport } from "../src/supply.js";
import { UINT256_MAX, formatUnits, parseUnits } from "../src/uint-math.js";
import { LedgerError } from "../src/types.js";
import type { LedgerState } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

const HOLDERS = [
  "0x1000000000000000000000000000000000000001",
  "0x2000000000000000000000000000000000000002",
  "0x3000000000000000000000000000000000000003",
  "0x4000000000000000000000000000000000000004",
] as const;

const arbHolder = fc.constantFrom(...HOLDERS);

const arbSupply = fc.bigInt({ min: 0n, max: 10n ** 30n });

type Op =
  | { kind: "transfer"; caller: string; to: string; amount: bigint }
  | { kind: "approve"; caller: string; spender: string; amount: bigint }
  | { kind: "transferFrom"; caller: string; from: string; to: string; amount: bigint };

const arbAmount = fc.oneof(
  fc.bigInt({ min: 0n, max: 10n ** 30n }),
  fc.constant(UINT256_MAX),
);

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({
    kind: fc.constant("transfer" as const),
    caller: arbHolder,
    to: arbHolder,
    amount: arbAmount,
  }),
  fc.record({
    kind: fc.constant("approve" as const),
    caller: arbHolder,
    spender: arbHolder,
    amount: arbAmount,
  }),
  fc.record({
    kind: fc.constant("transferFrom" as const),
    caller: arbHolder,
    from: arbHolder,
    to: arbHolder,
    amount: arbAmount,
  }),
);

const silent = { emit: (): void => undefined };

function apply(state: LedgerState, op: Op, emitted: Notification[] = []): void {
  const sink = { emit: (n: Notification): void => void emitted.push(n) };
  const ctx = { caller: op.caller, height: 1 };
  switch (op.kind) {
    case "transfer":
      transfer(state, ctx, op.to, op.amount, sink);
      return;
    case "approve":
      approve(state, ctx, op.spender, op.amount, sink);
      return;
    case "transferFrom":
      transferFrom(state, ctx, op.from, op.to, op.amount, sink);
      return;
  }
}

function fingerprint(state: LedgerState): string {
  const sorted = <V>(m: Map<string, V>): [string, string][] =>
    [...m.entries()].map(([k, v]): [string, string] => [k, String(v)]).sort();
  return JSON.stringify({
    balances: sorted(state.balances),
    allowances: sorted(state.allowances),
    counts: sorted(state.transferCounts),
    total: state.transferCount,
  });
}

// =============================================================================
// Property: Supply Conservation
// =============================================================================

describe("property: balances always sum to the total supply", () => {
  it("after any sequence of operations, successful or not", () => {
    fc.assert(
      fc.property(arbHolder, arbSupply, fc.array(arbOp, { maxLength: 30 }), (holder, supply, ops) => {
        const state = createLedgerState({ holder, totalSupply: supply });

        for (const op of ops) {
          try {
            apply(state, op);
          } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
          }
        }

        const report = computeSupplyReport(state);
        expect(report.balanced).toBe(true);
        expect(report.sumOfBalances).toBe(supply);
      }),
      { numRuns: 200 },
    );
  });
});

// =============================================================================
// Property: Failure Atomicity
// =============================================================================

describe("property: a rejected operation leaves no trace", () => {
  it("state and emitted notifications are unchanged on LedgerError", () => {
    fc.assert(
      fc.property(arbSupply, fc.array(arbOp, { maxLength: 20 }), (supply, ops) => {
        const state = createLedgerState({ holder: HOLDERS[0], totalSupply: supply });

        for (const op of ops) {
          const before = fingerprint(state);
          const emitted: Notification[] = [];
          try {
            apply(state, op, emitted);
            expect(emitted).toHaveLength(1);
          } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
            expect(fingerprint(state)).toBe(before);
            expect(emitted).toEqual([]);
          }
        }
      }),
      { numRuns: 200 },
    );
  });
});

// =============================================================================
// Property: Unlimited Allowance
// =============================================================================

describe("property: the unlimited allowance is never decremented", () => {
  it("any number of spends keeps UINT256_MAX", () => {
    fc.assert(
      fc.property(
        fc.array(fc.bigInt({ min: 0n, max: 1_000n }), { minLength: 1, maxLength: 20 }),
        (amounts) => {
          const [owner, spender, recipient] = HOLDERS;
          const supply = amounts.reduce((sum, a) => sum + a, 0n);
          const state = createLedgerState({ holder: owner, totalSupply: supply });
          approve(state, { caller: owner, height: 1 }, spender, UINT256_MAX, silent);

          for (const amount of amounts) {
            transferFrom(state, { caller: spender, height: 1 }, owner, recipient, amount, silent);
          }

          expect(allowanceOf(state, owner, spender)).toBe(UINT256_MAX);
          expect(balanceOf(state, recipient)).toBe(supply);
        },
      ),
    );
  });

  it("a finite allowance decreases by exactly the amount spent", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 0n, max: UINT256_MAX - 1n }),
        fc.bigInt({ min: 0n, max: 10n ** 20n }),
        (allowance, amount) => {
          fc.pre(amount <= allowance);
          const [owner, spender, recipient] = HOLDERS;
          const state = createLedgerState({ holder: owner, totalSupply: 10n ** 20n });
          approve(state, { caller: owner, height: 1 }, spender, allowance, silent);
          transferFrom(state, { caller: spender, height: 1 }, owner, recipient, amount, silent);

          expect(allowanceOf(state, owner, spender)).toBe(allowance - amount);
        },
      ),
    );
  });
});

// =============================================================================
// Property: Draft Isolation
// =============================================================================

describe("property: cloneLedgerState isolates drafts", () => {
  it("mutating a draft never changes the original", () => {
    fc.assert(
      fc.property(arbSupply, fc.array(arbOp, { maxLength: 15 }), (supply, ops) => {
        const state = createLedgerState({ holder: HOLDERS[0], totalSupply: supply });
        const before = fingerprint(state);
        const draft = cloneLedgerState(state);

        for (const op of ops) {
          try {
            apply(draft, op);
          } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
          }
        }

        expect(fingerprint(state)).toBe(before);
      }),
    );
  });
});

// =============================================================================
// Property: Decimal Roundtrip
// =============================================================================

describe("property: decimal conversion roundtrip", () => {
  it("parseUnits(formatUnits(x)) === x", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 0n, max: 10n ** 40n }),
        fc.integer({ min: 0, max: 24 }),
        (value, decimals) => {
          expect(parseUnits(formatUnits(value, decimals), decimals)).toBe(value);
        },
      ),
      { numRuns: 300 },
    );
  });
});
