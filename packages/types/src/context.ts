/**
 * Call Context
 *
 * Who is calling and what height it is. Supplied by the host for every
 * mutating call; the core never reads either from ambient state.
 */

import type { Address } from "./address.js";
import type { Notification } from "./notification.js";

/**
 * Host-supplied context for a single call.
 */
export interface CallContext {
  /** Identity of the caller for this invocation */
  readonly caller: Address;

  /** Current height. Non-decreasing across calls, never mutated by the core. */
  readonly height: number;
}

/**
 * Receives notifications as an operation emits them.
 */
export interface NotificationSink {
  emit(notification: Notification): void;
}
