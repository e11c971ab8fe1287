/**
 * Launch Controller — One-shot trajectory commit and ignition burns.
 *
 * Rules:
 * - Only the authority may commit or burn
 * - The commit happens at most once and cannot be undone
 * - The commit base is the authority's whole balance at commit time
 * - Allocations round down; the remainder stays with the authority
 * - Burns are repeatable and accumulate into totalBurned
 */

import type { CallContext, NotificationSink } from "@ignition/types";
import { isNullAddress } from "@ignition/types";
import {
  assertMovable,
  assertUint256,
  balanceOf,
  checkedAdd,
  moveBalance,
  mulDivFloor,
} from "@ignition/ledger";
import type { IgnitionBurnResult, TokenState, TrajectoryAllocation } from "./types.js";
import {
  BPS_DENOMINATOR,
  RESERVE_BPS,
  TREASURY_BPS,
  TokenError,
} from "./types.js";
import { advancePhase, assertAuthority } from "./state.js";

// =============================================================================
// Allocation
// =============================================================================

/**
 * Split a base into the reserve and treasury shares.
 */
export function computeAllocation(base: bigint): TrajectoryAllocation {
  const toReserve = mulDivFloor(base, RESERVE_BPS, BPS_DENOMINATOR);
  const toTreasury = mulDivFloor(base, TREASURY_BPS, BPS_DENOMINATOR);

  if (toReserve + toTreasury > base) {
    throw new TokenError(
      "INVALID_ALLOCATION",
      `Allocation ${toReserve.toString()} + ${toTreasury.toString()} exceeds base ${base.toString()}`,
    );
  }

  return { base, toReserve, toTreasury };
}

// =============================================================================
// Trajectory Commit
// =============================================================================

/**
 * Allocate the reserve and treasury shares of the authority's balance
 * and advance to "fuel-allocated".
 *
 * A share whose target is the null address, or whose amount is zero,
 * is not moved.
 */
export function commitTrajectory(
  state: TokenState,
  ctx: CallContext,
  sink: NotificationSink,
): TrajectoryAllocation {
  assertAuthority(state, ctx, "commit the trajectory");

  if (state.trajectoryCommitted) {
    throw new TokenError("TRAJECTORY_ALREADY_COMMITTED", "Trajectory has already been committed");
  }

  const { authority, liquidityReserve, treasury } = state.config;
  const base = balanceOf(state.ledger, authority);
  if (base === 0n) {
    throw new TokenError("ZERO_AMOUNT", "Authority holds nothing to allocate");
  }

  const allocation = computeAllocation(base);

  state.trajectoryCommitted = true;

  if (!isNullAddress(liquidityReserve) && allocation.toReserve > 0n) {
    moveBalance(state.ledger, authority, liquidityReserve, allocation.toReserve, sink);
    sink.emit({ type: "FuelAllocated", reserve: liquidityReserve, amount: allocation.toReserve });
  }
  if (!isNullAddress(treasury) && allocation.toTreasury > 0n) {
    moveBalance(state.ledger, authority, treasury, allocation.toTreasury, sink);
  }

  advancePhase(state, "fuel-allocated");

  sink.emit({
    type: "TrajectoryCommitted",
    height: ctx.height,
    reserveAmount: allocation.toReserve,
    treasuryAmount: allocation.toTreasury,
  });

  return allocation;
}

// =============================================================================
// Ignition Burn
// =============================================================================

/**
 * Send `amount` from the authority to the burn target.
 */
export function executeIgnitionBurn(
  state: TokenState,
  ctx: CallContext,
  amount: bigint,
  sink: NotificationSink,
): IgnitionBurnResult {
  assertAuthority(state, ctx, "burn");
  assertUint256(amount);

  if (amount === 0n) {
    throw new TokenError("ZERO_AMOUNT", "Burn amount must be greater than zero");
  }

  const { authority, burnTarget } = state.config;
  assertMovable(state.ledger, authority, burnTarget, amount);
  const totalBurned = checkedAdd(state.totalBurned, amount);

  moveBalance(state.ledger, authority, burnTarget, amount, sink);
  state.totalBurned = totalBurned;

  sink.emit({ type: "IgnitionBurn", target: burnTarget, amount, totalBurned });

  return { target: burnTarget, amount, totalBurned };
}

// =============================================================================
// Queries
// =============================================================================

export function isLaunchUnlocked(state: TokenState, height: number): boolean {
  return height >= state.config.launchUnlockHeight;
}
