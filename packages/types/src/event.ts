/**
 * Event Types
 *
 * Append-only event architecture.
 * Every notification is persisted as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, at which height, from which call)
 * - Payloads are JSON-safe (amounts as decimal strings)
 * - No UPDATE, no DELETE: only new events
 */

/**
 * Which facet emitted the event. Also the stream it is appended to.
 */
export type EventSource = "ledger" | "launch" | "vesting" | "mission-log";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** Height of the call that emitted the event */
  readonly height: number;

  /** Caller of the operation that emitted the event */
  readonly actor: string;

  /** Groups every event emitted by one call */
  readonly correlationId: string;

  /** Which facet emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Notification type (e.g., "Transfer", "MissionLogged") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (JSON-safe) */
  readonly payload: Readonly<Record<string, unknown>>;
}
