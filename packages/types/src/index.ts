/**
 * @ignition/types — Shared domain types for the Ignition stack.
 *
 * These types are used across all Ignition packages:
 * - Addresses and tags
 * - Host-supplied call context
 * - Notifications emitted by every mutating operation
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Address types
export type { Address, Tag } from "./address.js";
export { NULL_ADDRESS, DEAD_ADDRESS } from "./address.js";

// Call context
export type { CallContext, NotificationSink } from "./context.js";

// Notification types
export type {
  Notification,
  NotificationType,
  TransferNotification,
  ApprovalNotification,
  FuelAllocatedNotification,
  TrajectoryCommittedNotification,
  IgnitionBurnNotification,
  VestingScheduledNotification,
  VestingClaimedNotification,
  MissionLoggedNotification,
} from "./notification.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isNullAddress,
  isTag,
  isHeight,
  isCallContext,
  isNotificationType,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
