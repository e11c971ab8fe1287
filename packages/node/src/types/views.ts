/**
 * Response views.
 *
 * Domain values carry bigint amounts; responses are JSON, so every
 * amount leaves as a decimal string. Notifications reuse the event
 * payload encoding so a receipt and its stored events read the same.
 */

import type { Notification } from "@ignition/types";
import { toEventPayload } from "@ignition/event-store";
import type {
  CallReceipt,
  IgnitionBurnResult,
  MissionLogEntry,
  TokenStatus,
  TrajectoryAllocation,
  VestingGrant,
} from "@ignition/launch";
import type { VestingView } from "../services/token-service.js";

// =============================================================================
// Receipts
// =============================================================================

export type NotificationView = { readonly type: string } & Readonly<Record<string, string | number>>;

export interface ReceiptView<R> {
  readonly result: R;
  readonly correlationId: string;
  readonly height: number;
  readonly notifications: readonly NotificationView[];
}

export function toNotificationView(notification: Notification): NotificationView {
  return { type: notification.type, ...toEventPayload(notification) };
}

export function toReceiptView<T, R>(
  receipt: CallReceipt<T>,
  mapResult: (result: T) => R,
): ReceiptView<R> {
  return {
    result: mapResult(receipt.result),
    correlationId: receipt.correlationId,
    height: receipt.height,
    notifications: receipt.notifications.map(toNotificationView),
  };
}

export function toAllocationView(allocation: TrajectoryAllocation) {
  return {
    base: allocation.base.toString(),
    toReserve: allocation.toReserve.toString(),
    toTreasury: allocation.toTreasury.toString(),
  };
}

export function toBurnView(burn: IgnitionBurnResult) {
  return {
    target: burn.target,
    amount: burn.amount.toString(),
    totalBurned: burn.totalBurned.toString(),
  };
}

export function toGrantView(grant: VestingGrant) {
  return { total: grant.total.toString(), claimed: grant.claimed.toString() };
}

// =============================================================================
// Queries
// =============================================================================

export function toStatusView(status: TokenStatus, height: number, launchUnlocked: boolean) {
  return {
    name: status.name,
    symbol: status.symbol,
    decimals: status.decimals,
    totalSupply: status.totalSupply.toString(),
    phase: status.phase,
    trajectoryCommitted: status.trajectoryCommitted,
    totalBurned: status.totalBurned.toString(),
    height,
    launchUnlockHeight: status.launchUnlockHeight,
    launchUnlocked,
    vestingStartHeight: status.vestingStartHeight,
    missionLogLength: status.missionLogLength,
    transferCount: status.transferCount,
    supply: {
      sumOfBalances: status.supply.sumOfBalances.toString(),
      holders: status.supply.holders,
      balanced: status.supply.balanced,
    },
  };
}

export function toVestingView(view: VestingView) {
  return {
    beneficiary: view.beneficiary,
    ...toGrantView(view.grant),
    claimable: view.claimable.toString(),
    height: view.height,
    schedule: view.schedule,
  };
}

export function toMissionLogEntryView(entry: MissionLogEntry) {
  return {
    index: entry.index,
    height: entry.height,
    value: entry.value.toString(),
    tag: entry.tag,
  };
}
