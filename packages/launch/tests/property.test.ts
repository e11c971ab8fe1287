/**
 * Property-Based Tests for @ignition/launch
 *
 * 1. Any sequence of calls keeps balances summing to the supply cap
 * 2. Allocations never exceed their base
 * 3. Vested amounts never decrease and never exceed the grant
 * 4. Claims never exceed the grant, whatever heights they happen at
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { LedgerError } from "@ignition/ledger";
import { Token } from "../src/token.js";
import { computeAllocation } from "../src/launch-controller.js";
import { vestedAmount } from "../src/vesting.js";
import { TokenError, VESTING_CLIFF, VESTING_DURATION } from "../src/types.js";
import type { VestingSchedule } from "../src/types.js";
import { ALICE, AUTHORITY, BOB, CONFIG, LEDGER, START, ctx, tag } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACTORS = [AUTHORITY, ALICE, BOB, LEDGER] as const;
const arbActor = fc.constantFrom(...ACTORS);
const arbAmount = fc.bigInt({ min: 0n, max: 400_000n });
const arbHeight = fc.integer({ min: 0, max: START + VESTING_CLIFF + VESTING_DURATION + 100 });

type Call =
  | { kind: "transfer"; caller: string; to: string; amount: bigint }
  | { kind: "approve"; caller: string; spender: string; amount: bigint }
  | { kind: "transferFrom"; caller: string; from: string; to: string; amount: bigint }
  | { kind: "commit"; caller: string }
  | { kind: "burn"; caller: string; amount: bigint }
  | { kind: "schedule"; caller: string; beneficiary: string; amount: bigint }
  | { kind: "claim"; caller: string; height: number }
  | { kind: "log"; caller: string; value: bigint };

const arbCall: fc.Arbitrary<Call> = fc.oneof(
  fc.record({ kind: fc.constant("transfer" as const), caller: arbActor, to: arbActor, amount: arbAmount }),
  fc.record({ kind: fc.constant("approve" as const), caller: arbActor, spender: arbActor, amount: arbAmount }),
  fc.record({
    kind: fc.constant("transferFrom" as const),
    caller: arbActor,
    from: arbActor,
    to: arbActor,
    amount: arbAmount,
  }),
  fc.record({ kind: fc.constant("commit" as const), caller: arbActor }),
  fc.record({ kind: fc.constant("burn" as const), caller: arbActor, amount: arbAmount }),
  fc.record({
    kind: fc.constant("schedule" as const),
    caller: arbActor,
    beneficiary: arbActor,
    amount: arbAmount,
  }),
  fc.record({ kind: fc.constant("claim" as const), caller: arbActor, height: arbHeight }),
  fc.record({ kind: fc.constant("log" as const), caller: arbActor, value: arbAmount }),
);

function invoke(token: Token, call: Call): void {
  switch (call.kind) {
    case "transfer":
      token.transfer(ctx(call.caller), call.to, call.amount);
      return;
    case "approve":
      token.approve(ctx(call.caller), call.spender, call.amount);
      return;
    case "transferFrom":
      token.transferFrom(ctx(call.caller), call.from, call.to, call.amount);
      return;
    case "commit":
      token.commitTrajectory(ctx(call.caller));
      return;
    case "burn":
      token.executeIgnitionBurn(ctx(call.caller), call.amount);
      return;
    case "schedule":
      token.scheduleVesting(ctx(call.caller), call.beneficiary, call.amount);
      return;
    case "claim":
      token.claimVested(ctx(call.caller, call.height));
      return;
    case "log":
      token.logMission(ctx(call.caller), call.value, tag("01"));
      return;
  }
}

/** Run a call; domain rejections are expected, anything else is a bug. */
function attempt(token: Token, call: Call): boolean {
  try {
    invoke(token, call);
    return true;
  } catch (err) {
    if (err instanceof TokenError || err instanceof LedgerError) return false;
    throw err;
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("launch properties", () => {
  it("balances always sum to the supply cap", () => {
    fc.assert(
      fc.property(fc.array(arbCall, { maxLength: 40 }), (calls) => {
        const token = Token.create(CONFIG);
        for (const call of calls) {
          attempt(token, call);
          const report = token.supplyReport();
          expect(report.balanced).toBe(true);
          expect(report.totalSupply).toBe(1_000_000n);
        }
      }),
    );
  });

  it("a rejected call leaves the snapshot unchanged", () => {
    fc.assert(
      fc.property(fc.array(arbCall, { maxLength: 20 }), arbCall, (setup, call) => {
        const token = Token.create(CONFIG);
        for (const c of setup) attempt(token, c);

        const before = { ...token.snapshot(), asOf: "" };
        if (!attempt(token, call)) {
          expect({ ...token.snapshot(), asOf: "" }).toEqual(before);
        }
      }),
    );
  });

  it("allocations never exceed their base", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 2n ** 256n - 1n }), (base) => {
        const { toReserve, toTreasury } = computeAllocation(base);
        expect(toReserve + toTreasury <= base).toBe(true);
        expect(toReserve >= toTreasury).toBe(true);
      }),
    );
  });

  it("vested amounts are monotonic and bounded by the grant", () => {
    const schedule: VestingSchedule = { startHeight: START, cliff: VESTING_CLIFF, duration: VESTING_DURATION };

    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 10n ** 30n }), arbHeight, arbHeight, (total, a, b) => {
        const [lo, hi] = a <= b ? [a, b] : [b, a];
        const early = vestedAmount(total, lo, schedule);
        const late = vestedAmount(total, hi, schedule);

        expect(early <= late).toBe(true);
        expect(late <= total).toBe(true);
      }),
    );
  });

  it("claims never exceed the grant", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: 1n, max: 500_000n }),
        fc.array(arbHeight, { maxLength: 15 }),
        (amount, heights) => {
          const token = Token.create(CONFIG);
          token.scheduleVesting(ctx(AUTHORITY), ALICE, amount);

          let received = 0n;
          for (const height of [...heights].sort((x, y) => x - y)) {
            try {
              received += token.claimVested(ctx(ALICE, height)).result;
            } catch (err) {
              if (!(err instanceof TokenError)) throw err;
            }
          }

          const grant = token.getVestingGrant(ALICE);
          expect(grant.claimed).toBe(received);
          expect(received <= amount).toBe(true);
          expect(token.balanceOf(ALICE)).toBe(received);
        },
      ),
    );
  });
});
