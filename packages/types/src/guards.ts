/**
 * Runtime Type Guards
 *
 * Narrowing functions for the shared domain types.
 * These enable safe runtime validation at system boundaries
 * (HTTP inputs, persisted event files, host-supplied context).
 */

import type { Address, Tag } from "./address.js";
import { NULL_ADDRESS } from "./address.js";
import type { CallContext } from "./context.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import type { NotificationType } from "./notification.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Address guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const TAG_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isNullAddress(value: Address): boolean {
  return value.toLowerCase() === NULL_ADDRESS;
}

export function isTag(value: unknown): value is Tag {
  return typeof value === "string" && TAG_PATTERN.test(value);
}

export function isHeight(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isCallContext(value: unknown): value is CallContext {
  if (!isRecord(value)) return false;
  return isAddress(value.caller) && isHeight(value.height);
}

// =============================================================================
// Notification guards
// =============================================================================

const NOTIFICATION_TYPES = new Set<string>([
  "Transfer",
  "Approval",
  "FuelAllocated",
  "TrajectoryCommitted",
  "IgnitionBurn",
  "VestingScheduled",
  "VestingClaimed",
  "MissionLogged",
]);

export function isNotificationType(value: unknown): value is NotificationType {
  return typeof value === "string" && NOTIFICATION_TYPES.has(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "launch", "vesting", "mission-log"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    isHeight(value.height) &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
