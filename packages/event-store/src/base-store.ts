/**
 * @ignition/event-store — Shared EventStore machinery.
 *
 * Indexing, reads, hash chaining and subscription dispatch are the same
 * for every backing. Subclasses decide only where a batch is persisted
 * before it becomes visible.
 */

import type { DomainEvent } from "@ignition/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  StreamEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export abstract class BaseEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();

  /** Hash of the last stored event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  /** Global position of the last stored event */
  private _headPosition = 0;

  /**
   * Persist a batch before it is indexed. Throwing here aborts the append
   * with nothing indexed or dispatched.
   */
  protected abstract persist(events: readonly StoredEvent[]): void;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    this.appendBatch(events.map((event) => ({ streamId, event })));

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  appendBatch(entries: readonly StreamEvent[]): readonly StoredEvent[] {
    if (entries.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events");
    }
    for (const { streamId } of entries) {
      this._validateStreamId(streamId);
    }

    const firstPosition = this.globalPosition() + 1;
    const appendedAt = new Date().toISOString();
    const versions = new Map<string, number>();
    const storedEvents: StoredEvent[] = [];
    let previousHash = this._lastHash;

    for (const [i, { streamId, event }] of entries.entries()) {
      const version =
        (versions.get(streamId) ?? this.streamVersion(streamId)) + 1;
      versions.set(streamId, version);

      const base = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version,
        globalPosition: firstPosition + i,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);

      storedEvents.push({ ...base, hash, previousHash });
      previousHash = hash;
    }

    // Nothing below runs unless the whole batch was persisted.
    this.persist(storedEvents);

    for (const stored of storedEvents) {
      this.index(stored);
    }
    this._dispatch(storedEvents);

    return storedEvents;
  }

  /**
   * Add an already-stored event to the in-memory indexes.
   * Used by append and by backings that reload from disk.
   */
  protected index(stored: StoredEvent): void {
    let stream = this._streams.get(stored.streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(stored.streamId, stream);
    }
    stream.push(stored);
    this._globalLog.push(stored);
    this._lastHash = stored.hash;
    this._headPosition = Math.max(this._headPosition, stored.globalPosition);
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    return limit(
      stream.filter((e) => e.version >= fromVersion),
      options?.maxCount,
    );
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    return limit(
      this._globalLog.filter((e) => e.globalPosition >= fromPosition),
      options?.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    const subscribers =
      this._streamSubscribers.get(streamId) ?? new Set<EventHandler>();
    this._streamSubscribers.set(streamId, subscribers);
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.at(-1)?.version ?? 0;
  }

  globalPosition(): number {
    return this._headPosition;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const event of events) {
      const streamSubs = this._streamSubscribers.get(event.streamId);
      if (streamSubs !== undefined) {
        for (const handler of streamSubs) {
          handler(event);
        }
      }
    }

    for (const handler of this._globalSubscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}

function limit(
  events: StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0
    ? events.slice(0, maxCount)
    : events;
}
