/**
 * Notification Types
 *
 * Every mutating operation emits an ordered list of notifications.
 * Observers (indexers, UIs) consume them; the core never reads them back.
 *
 * Discriminated by `type`. Amounts are bigint here and become decimal
 * strings once they cross into the event stream.
 */

import type { Address, Tag } from "./address.js";

/** Funds moved between two addresses (including mint from the null address). */
export interface TransferNotification {
  readonly type: "Transfer";
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
}

/** An allowance was set. */
export interface ApprovalNotification {
  readonly type: "Approval";
  readonly owner: Address;
  readonly spender: Address;
  readonly value: bigint;
}

/** The liquidity reserve received its share of the trajectory commit. */
export interface FuelAllocatedNotification {
  readonly type: "FuelAllocated";
  readonly reserve: Address;
  readonly amount: bigint;
}

/** The one-time trajectory commit completed. */
export interface TrajectoryCommittedNotification {
  readonly type: "TrajectoryCommitted";
  readonly height: number;
  readonly reserveAmount: bigint;
  readonly treasuryAmount: bigint;
}

/** The authority burned funds to the burn target. */
export interface IgnitionBurnNotification {
  readonly type: "IgnitionBurn";
  readonly target: Address;
  readonly amount: bigint;
  readonly totalBurned: bigint;
}

/** Funds were escrowed for a beneficiary. */
export interface VestingScheduledNotification {
  readonly type: "VestingScheduled";
  readonly beneficiary: Address;
  readonly amount: bigint;
  readonly totalGranted: bigint;
}

/** A beneficiary claimed vested funds. */
export interface VestingClaimedNotification {
  readonly type: "VestingClaimed";
  readonly beneficiary: Address;
  readonly amount: bigint;
  readonly totalClaimed: bigint;
}

/** An entry was appended to the mission log. */
export interface MissionLoggedNotification {
  readonly type: "MissionLogged";
  readonly index: number;
  readonly height: number;
  readonly value: bigint;
  readonly tag: Tag;
}

export type Notification =
  | TransferNotification
  | ApprovalNotification
  | FuelAllocatedNotification
  | TrajectoryCommittedNotification
  | IgnitionBurnNotification
  | VestingScheduledNotification
  | VestingClaimedNotification
  | MissionLoggedNotification;

export type NotificationType = Notification["type"];
