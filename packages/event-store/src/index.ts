/**
 * @ignition/event-store — Append-only notification stream.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore for tests and development
 * - JsonlEventStore for durable file-based persistence
 * - Notification → DomainEvent mapping (one stream per source)
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  AppendResult,
  StreamEvent,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { UnhashedEvent } from "./hash-chain.js";

// Implementations
export { BaseEventStore } from "./base-store.js";
export { InMemoryEventStore } from "./in-memory-store.js";
export { JsonlEventStore } from "./jsonl-store.js";
export type { JsonlEventStoreOptions } from "./jsonl-store.js";

// Notification mapping
export {
  NOTIFICATION_SOURCES,
  sourceOf,
  toEventPayload,
  toDomainEvent,
} from "./notification-events.js";
export type { NotificationContext } from "./notification-events.js";
