/**
 * @ignition/launch domain types.
 *
 * The launch package manages everything above plain balances:
 * - One-shot trajectory commit (liquidity reserve + treasury allocation)
 * - Repeatable ignition burns
 * - Cliff-plus-linear vesting out of ledger escrow
 * - A bounded, append-only mission log
 *
 * All of it lives in one aggregate, TokenState, owned by a Token.
 */

import type { Address, Notification, Tag } from "@ignition/types";
import type { LedgerState, SupplyReport } from "@ignition/ledger";

// =============================================================================
// Constants
// =============================================================================

/** Liquidity reserve share of the commit base, in basis points. */
export const RESERVE_BPS = 892n;

/** Treasury share of the commit base, in basis points. */
export const TREASURY_BPS = 108n;

export const BPS_DENOMINATOR = 10_000n;

/** Blocks after the vesting start before anything vests. */
export const VESTING_CLIFF = 720;

/** Blocks after the cliff until a grant is fully vested. */
export const VESTING_DURATION = 7_776;

export const MISSION_LOG_CAPACITY = 1_992;

// =============================================================================
// Launch Phase
// =============================================================================

export type LaunchPhase =
  | "pre-ignition"
  | "trajectory-lock"
  | "fuel-allocated"
  | "live";

/**
 * Phases in order. A token only ever moves forward through this list.
 * Nothing currently enters "trajectory-lock" or "live".
 */
export const LAUNCH_PHASES: readonly LaunchPhase[] = [
  "pre-ignition",
  "trajectory-lock",
  "fuel-allocated",
  "live",
];

// =============================================================================
// Configuration
// =============================================================================

/** Construction parameters. Immutable once the token exists. */
export interface TokenConfig {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  /** Minted to the authority at genesis */
  readonly supplyCap: bigint;
  readonly authority: Address;
  /** The token's own custody address; holds vesting escrow */
  readonly ledgerAddress: Address;
  readonly liquidityReserve: Address;
  readonly treasury: Address;
  /** Falls back to DEAD_ADDRESS when absent or null */
  readonly burnTarget?: Address;
  readonly launchUnlockHeight: number;
  readonly vestingStartHeight: number;
}

// =============================================================================
// Vesting
// =============================================================================

export interface VestingGrant {
  readonly total: bigint;
  readonly claimed: bigint;
}

/** Heights that shape the release curve. */
export interface VestingSchedule {
  readonly startHeight: number;
  readonly cliff: number;
  readonly duration: number;
}

// =============================================================================
// Mission Log
// =============================================================================

export interface MissionLogEntry {
  readonly index: number;
  readonly height: number;
  readonly value: bigint;
  readonly tag: Tag;
}

// =============================================================================
// Aggregate State
// =============================================================================

/**
 * Everything a Token owns. Facet functions mutate a draft of this;
 * the Token swaps the draft in only when the whole call succeeded.
 */
export interface TokenState {
  /** Normalised (lowercase addresses, burn target resolved) */
  readonly config: Required<TokenConfig>;
  readonly ledger: LedgerState;
  phase: LaunchPhase;
  trajectoryCommitted: boolean;
  totalBurned: bigint;
  readonly grants: Map<Address, VestingGrant>;
  readonly missionLog: MissionLogEntry[];
}

// =============================================================================
// Operation Results
// =============================================================================

export interface TrajectoryAllocation {
  readonly base: bigint;
  readonly toReserve: bigint;
  readonly toTreasury: bigint;
}

export interface IgnitionBurnResult {
  readonly target: Address;
  readonly amount: bigint;
  readonly totalBurned: bigint;
}

/** What a successful mutating call returns. */
export interface CallReceipt<T> {
  readonly result: T;
  /** Shared by every event this call published */
  readonly correlationId: string;
  readonly height: number;
  readonly notifications: readonly Notification[];
}

// =============================================================================
// Token Status & Snapshot
// =============================================================================

export interface TokenStatus {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: bigint;
  readonly phase: LaunchPhase;
  readonly trajectoryCommitted: boolean;
  readonly totalBurned: bigint;
  readonly launchUnlockHeight: number;
  readonly vestingStartHeight: number;
  readonly missionLogLength: number;
  readonly transferCount: number;
  readonly supply: SupplyReport;
}

/** JSON-safe token state. Amounts are decimal strings. */
export interface TokenSnapshot {
  readonly version: 1;
  readonly config: Omit<Required<TokenConfig>, "supplyCap"> & {
    readonly supplyCap: string;
  };
  readonly balances: readonly (readonly [Address, string])[];
  readonly allowances: readonly {
    readonly owner: Address;
    readonly spender: Address;
    readonly value: string;
  }[];
  readonly transferCounts: readonly (readonly [Address, number])[];
  readonly transferCount: number;
  readonly phase: LaunchPhase;
  readonly trajectoryCommitted: boolean;
  readonly totalBurned: string;
  readonly grants: readonly {
    readonly beneficiary: Address;
    readonly total: string;
    readonly claimed: string;
  }[];
  readonly missionLog: readonly {
    readonly index: number;
    readonly height: number;
    readonly value: string;
    readonly tag: Tag;
  }[];
  readonly asOf: string;
}

// =============================================================================
// Errors
// =============================================================================

export type TokenErrorCode =
  | "UNAUTHORIZED"
  | "TRAJECTORY_ALREADY_COMMITTED"
  | "ZERO_AMOUNT"
  | "INVALID_ALLOCATION"
  | "VESTING_NOT_STARTED"
  | "CLIFF_NOT_REACHED"
  | "NOTHING_TO_CLAIM"
  | "MISSION_LOG_FULL"
  | "INDEX_OUT_OF_BOUNDS"
  | "INVALID_TAG"
  | "INVALID_CONTEXT"
  | "INVALID_CONFIG";

export class TokenError extends Error {
  public readonly code: TokenErrorCode;
  constructor(code: TokenErrorCode, message: string) {
    super(message);
    this.name = "TokenError";
    this.code = code;
  }
}
