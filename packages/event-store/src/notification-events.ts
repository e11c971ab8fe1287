/**
 * @ignition/event-store — Notification → DomainEvent mapping.
 *
 * Notifications carry bigint amounts; the persisted form is JSON, so
 * amounts become decimal strings. Each notification type belongs to one
 * source, which is also the stream it is appended to.
 */

import type {
  DomainEvent,
  EventSource,
  Notification,
  NotificationType,
} from "@ignition/types";

/**
 * Source (and stream) for each notification type.
 */
export const NOTIFICATION_SOURCES: Readonly<Record<NotificationType, EventSource>> = {
  Transfer: "ledger",
  Approval: "ledger",
  FuelAllocated: "launch",
  TrajectoryCommitted: "launch",
  IgnitionBurn: "launch",
  VestingScheduled: "vesting",
  VestingClaimed: "vesting",
  MissionLogged: "mission-log",
};

/**
 * The call-level half of the metadata; `source` is derived per event.
 */
export interface NotificationContext {
  readonly eventId: string;
  readonly height: number;
  readonly actor: string;
  readonly correlationId: string;
}

export function sourceOf(notification: Notification): EventSource {
  return NOTIFICATION_SOURCES[notification.type];
}

/**
 * JSON-safe payload: every field but `type`, with amounts as decimal strings.
 */
export function toEventPayload(
  notification: Notification,
): Readonly<Record<string, string | number>> {
  switch (notification.type) {
    case "Transfer":
      return {
        from: notification.from,
        to: notification.to,
        value: notification.value.toString(),
      };
    case "Approval":
      return {
        owner: notification.owner,
        spender: notification.spender,
        value: notification.value.toString(),
      };
    case "FuelAllocated":
      return {
        reserve: notification.reserve,
        amount: notification.amount.toString(),
      };
    case "TrajectoryCommitted":
      return {
        height: notification.height,
        reserveAmount: notification.reserveAmount.toString(),
        treasuryAmount: notification.treasuryAmount.toString(),
      };
    case "IgnitionBurn":
      return {
        target: notification.target,
        amount: notification.amount.toString(),
        totalBurned: notification.totalBurned.toString(),
      };
    case "VestingScheduled":
      return {
        beneficiary: notification.beneficiary,
        amount: notification.amount.toString(),
        totalGranted: notification.totalGranted.toString(),
      };
    case "VestingClaimed":
      return {
        beneficiary: notification.beneficiary,
        amount: notification.amount.toString(),
        totalClaimed: notification.totalClaimed.toString(),
      };
    case "MissionLogged":
      return {
        index: notification.index,
        height: notification.height,
        value: notification.value.toString(),
        tag: notification.tag,
      };
  }
}

export function toDomainEvent(
  notification: Notification,
  context: NotificationContext,
): DomainEvent {
  return {
    type: notification.type,
    metadata: { ...context, source: sourceOf(notification) },
    payload: toEventPayload(notification),
  };
}
