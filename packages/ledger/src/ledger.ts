/**
 * @ignition/ledger — Balance and allowance engine.
 *
 * Operates on an explicit LedgerState. Every operation checks all of its
 * preconditions before the first write, so a thrown LedgerError never
 * leaves a partial mutation behind.
 *
 * API surface:
 * - createLedgerState() — Credit the whole supply to the genesis holder
 * - balanceOf() / allowanceOf() / transferCountOf() — Reads
 * - transfer() — Move from the caller
 * - approve() — Overwrite an allowance
 * - transferFrom() — Move on behalf of an owner, consuming allowance
 * - moveBalance() — Shared move logic, also used by launch and vesting
 */

import type { Address, CallContext, NotificationSink } from "@ignition/types";
import { isNullAddress } from "@ignition/types";
import { allowanceKey, normalizeAddress } from "./addresses.js";
import { assertUint256, checkedAdd, checkedSub, UINT256_MAX } from "./uint-math.js";
import type { LedgerGenesis, LedgerState } from "./types.js";
import { LedgerError } from "./types.js";

// ─── State ───────────────────────────────────────────────────────────────

export function createLedgerState(genesis: LedgerGenesis): LedgerState {
  const holder = normalizeAddress(genesis.holder, "genesis holder");
  const totalSupply = assertUint256(genesis.totalSupply, "total supply");

  return {
    totalSupply,
    balances: new Map([[holder, totalSupply]]),
    allowances: new Map(),
    transferCounts: new Map(),
    transferCount: 0,
  };
}

/**
 * Copy a state so it can be mutated as a draft.
 * Values are immutable bigints and numbers, so one level is enough.
 */
export function cloneLedgerState(state: LedgerState): LedgerState {
  return {
    totalSupply: state.totalSupply,
    balances: new Map(state.balances),
    allowances: new Map(state.allowances),
    transferCounts: new Map(state.transferCounts),
    transferCount: state.transferCount,
  };
}

// ─── Reads ───────────────────────────────────────────────────────────────

export function balanceOf(state: LedgerState, address: Address): bigint {
  return state.balances.get(address) ?? 0n;
}

export function allowanceOf(
  state: LedgerState,
  owner: Address,
  spender: Address,
): bigint {
  return state.allowances.get(allowanceKey(owner, spender)) ?? 0n;
}

export function transferCountOf(state: LedgerState, address: Address): number {
  return state.transferCounts.get(address) ?? 0;
}

// ─── Move Logic ──────────────────────────────────────────────────────────

/**
 * Check that a move can be applied. Throws without touching state.
 */
export function assertMovable(
  state: LedgerState,
  from: Address,
  to: Address,
  amount: bigint,
): void {
  if (isNullAddress(from)) {
    throw new LedgerError("INVALID_RECIPIENT", "Cannot move funds from the null address");
  }
  if (isNullAddress(to)) {
    throw new LedgerError("INVALID_RECIPIENT", "Cannot move funds to the null address");
  }

  const available = balanceOf(state, from);
  if (available < amount) {
    throw new LedgerError(
      "INSUFFICIENT_BALANCE",
      `Balance of ${from} is ${available.toString()}, needs ${amount.toString()}`,
    );
  }
}

/**
 * Move `amount` from `from` to `to`, bump the transfer counters and emit
 * a Transfer notification. Addresses must already be normalised.
 */
export function moveBalance(
  state: LedgerState,
  from: Address,
  to: Address,
  amount: bigint,
  sink: NotificationSink,
): void {
  assertUint256(amount);
  assertMovable(state, from, to, amount);

  // Both sides are computed before either is written. A move to self
  // credits the debited balance.
  const fromAfter = checkedSub(balanceOf(state, from), amount);
  const toAfter = checkedAdd(from === to ? fromAfter : balanceOf(state, to), amount);

  state.balances.set(from, fromAfter);
  state.balances.set(to, toAfter);

  state.transferCount += 1;
  state.transferCounts.set(from, transferCountOf(state, from) + 1);

  sink.emit({ type: "Transfer", from, to, value: amount });
}

// ─── Operations ──────────────────────────────────────────────────────────

/**
 * Move `amount` from the caller to `to`. Zero amounts are permitted.
 */
export function transfer(
  state: LedgerState,
  ctx: CallContext,
  to: string,
  amount: bigint,
  sink: NotificationSink,
): void {
  const from = normalizeAddress(ctx.caller, "caller");
  const recipient = normalizeAddress(to, "recipient");
  moveBalance(state, from, recipient, amount, sink);
}

/**
 * Overwrite the caller's allowance for `spender`.
 */
export function approve(
  state: LedgerState,
  ctx: CallContext,
  spender: string,
  amount: bigint,
  sink: NotificationSink,
): void {
  const owner = normalizeAddress(ctx.caller, "caller");
  const approved = normalizeAddress(spender, "spender");
  assertUint256(amount);

  state.allowances.set(allowanceKey(owner, approved), amount);
  sink.emit({ type: "Approval", owner, spender: approved, value: amount });
}

/**
 * Move `amount` from `from` to `to` on the caller's allowance.
 *
 * An allowance of UINT256_MAX is unlimited and is never decremented.
 */
export function transferFrom(
  state: LedgerState,
  ctx: CallContext,
  from: string,
  to: string,
  amount: bigint,
  sink: NotificationSink,
): void {
  const spender = normalizeAddress(ctx.caller, "caller");
  const owner = normalizeAddress(from, "owner");
  const recipient = normalizeAddress(to, "recipient");
  assertUint256(amount);

  const current = allowanceOf(state, owner, spender);
  const unlimited = current === UINT256_MAX;

  if (!unlimited && current < amount) {
    throw new LedgerError(
      "INSUFFICIENT_ALLOWANCE",
      `Allowance of ${spender} over ${owner} is ${current.toString()}, needs ${amount.toString()}`,
    );
  }
  assertMovable(state, owner, recipient, amount);

  if (!unlimited) {
    state.allowances.set(allowanceKey(owner, spender), checkedSub(current, amount));
  }
  moveBalance(state, owner, recipient, amount, sink);
}
