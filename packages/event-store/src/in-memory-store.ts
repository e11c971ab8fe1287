/**
 * @ignition/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Development and prototyping
 *
 * Not suitable for production (all state lost on process exit).
 */

import { BaseEventStore } from "./base-store.js";

export class InMemoryEventStore extends BaseEventStore {
  protected persist(): void {
    // Nothing outlives the process.
  }
}
