/**
 * Vesting Engine — Escrowed grants with a cliff and linear release.
 *
 * Grants are funded from the authority into the token's own custody
 * (ledgerAddress) before the trajectory commit. After the cliff, each
 * grant releases linearly over VESTING_DURATION blocks.
 *
 * Rules:
 * - Only the authority may schedule, and only before the commit
 * - Repeated grants to the same beneficiary accumulate
 * - claimed never exceeds the vested amount
 * - The vested amount never decreases as height grows
 */

import type { Address, CallContext, NotificationSink } from "@ignition/types";
import { isNullAddress } from "@ignition/types";
import {
  LedgerError,
  assertMovable,
  assertUint256,
  checkedAdd,
  moveBalance,
  mulDivFloor,
  normalizeAddress,
} from "@ignition/ledger";
import type { TokenState, VestingGrant, VestingSchedule } from "./types.js";
import { TokenError, VESTING_CLIFF, VESTING_DURATION } from "./types.js";
import { assertAuthority } from "./state.js";

const EMPTY_GRANT: VestingGrant = { total: 0n, claimed: 0n };

export function vestingScheduleOf(state: TokenState): VestingSchedule {
  return {
    startHeight: state.config.vestingStartHeight,
    cliff: VESTING_CLIFF,
    duration: VESTING_DURATION,
  };
}

export function grantOf(state: TokenState, beneficiary: Address): VestingGrant {
  return state.grants.get(beneficiary) ?? EMPTY_GRANT;
}

// =============================================================================
// Release Curve
// =============================================================================

/**
 * Amount of `total` vested at `height`.
 *
 * Zero before start + cliff, `total` from start + cliff + duration on,
 * floor(total * elapsed / duration) in between.
 */
export function vestedAmount(total: bigint, height: number, schedule: VestingSchedule): bigint {
  const cliffHeight = schedule.startHeight + schedule.cliff;
  if (height < cliffHeight) {
    return 0n;
  }

  const elapsed = height - cliffHeight;
  if (elapsed >= schedule.duration) {
    return total;
  }
  return mulDivFloor(total, BigInt(elapsed), BigInt(schedule.duration));
}

/**
 * What a grant could claim at `height`: vested minus already claimed.
 */
export function computeClaimable(
  grant: VestingGrant,
  height: number,
  schedule: VestingSchedule,
): bigint {
  const vested = vestedAmount(grant.total, height, schedule);
  return vested > grant.claimed ? vested - grant.claimed : 0n;
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Escrow `amount` of the authority's balance for `beneficiary`.
 */
export function scheduleVesting(
  state: TokenState,
  ctx: CallContext,
  beneficiary: string,
  amount: bigint,
  sink: NotificationSink,
): VestingGrant {
  assertAuthority(state, ctx, "schedule vesting");

  if (state.trajectoryCommitted) {
    throw new TokenError(
      "TRAJECTORY_ALREADY_COMMITTED",
      "Vesting can only be scheduled before the trajectory commit",
    );
  }

  const recipient = normalizeAddress(beneficiary, "beneficiary");
  if (isNullAddress(recipient)) {
    throw new LedgerError("INVALID_RECIPIENT", "Cannot vest to the null address");
  }

  assertUint256(amount);
  if (amount === 0n) {
    throw new TokenError("ZERO_AMOUNT", "Vesting amount must be greater than zero");
  }

  const { authority, ledgerAddress } = state.config;
  assertMovable(state.ledger, authority, ledgerAddress, amount);

  const current = grantOf(state, recipient);
  const grant: VestingGrant = {
    total: checkedAdd(current.total, amount),
    claimed: current.claimed,
  };

  moveBalance(state.ledger, authority, ledgerAddress, amount, sink);
  state.grants.set(recipient, grant);

  sink.emit({
    type: "VestingScheduled",
    beneficiary: recipient,
    amount,
    totalGranted: grant.total,
  });

  return grant;
}

/**
 * Release everything the caller has vested but not yet claimed.
 * Returns the amount released.
 */
export function claimVested(
  state: TokenState,
  ctx: CallContext,
  sink: NotificationSink,
): bigint {
  const beneficiary = normalizeAddress(ctx.caller, "caller");
  const schedule = vestingScheduleOf(state);

  if (ctx.height < schedule.startHeight) {
    throw new TokenError(
      "VESTING_NOT_STARTED",
      `Vesting starts at height ${schedule.startHeight}, now ${ctx.height}`,
    );
  }
  if (ctx.height < schedule.startHeight + schedule.cliff) {
    throw new TokenError(
      "CLIFF_NOT_REACHED",
      `Cliff ends at height ${schedule.startHeight + schedule.cliff}, now ${ctx.height}`,
    );
  }

  const grant = grantOf(state, beneficiary);
  if (grant.total <= grant.claimed) {
    throw new TokenError("NOTHING_TO_CLAIM", `${beneficiary} has no unclaimed grant`);
  }

  const amount = computeClaimable(grant, ctx.height, schedule);
  if (amount === 0n) {
    throw new TokenError("NOTHING_TO_CLAIM", `Nothing has vested for ${beneficiary} since the last claim`);
  }

  const claimed = checkedAdd(grant.claimed, amount);
  moveBalance(state.ledger, state.config.ledgerAddress, beneficiary, amount, sink);
  state.grants.set(beneficiary, { total: grant.total, claimed });

  sink.emit({
    type: "VestingClaimed",
    beneficiary,
    amount,
    totalClaimed: claimed,
  });

  return amount;
}
