/**
 * Tests for the event hash chain.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@ignition/types";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "../src/hash-chain.js";
import type { UnhashedEvent } from "../src/hash-chain.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import type { StoredEvent } from "../src/types.js";

function makeEvent(type: string, value: string): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${value}`,
      height: 1,
      actor: "0x00000000000000000000000000000000000a11ce",
      correlationId: "call-1",
      source: "ledger",
    },
    payload: { value },
  };
}

const base: UnhashedEvent = {
  event: makeEvent("Transfer", "5"),
  streamId: "ledger",
  version: 1,
  globalPosition: 1,
  appendedAt: "2026-01-01T00:00:00.000Z",
};

function chainOf(count: number): StoredEvent[] {
  const store = new InMemoryEventStore();
  store.append(
    "ledger",
    Array.from({ length: count }, (_, i) => makeEvent("Transfer", String(i))),
  );
  return [...store.readAll()];
}

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("is a deterministic hex SHA-256", () => {
    const h1 = computeEventHash(base, GENESIS_HASH);
    const h2 = computeEventHash({ ...base }, GENESIS_HASH);

    expect(h1).toMatch(/^[0-9a-f]{64}$/);
    expect(h1).toBe(h2);
  });

  it("ignores key order in the payload", () => {
    const a = { ...base, event: { ...base.event, payload: { x: "1", y: "2" } } };
    const b = { ...base, event: { ...base.event, payload: { y: "2", x: "1" } } };

    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when the payload changes", () => {
    const modified = { ...base, event: { ...base.event, payload: { value: "6" } } };

    expect(computeEventHash(modified, GENESIS_HASH)).not.toBe(
      computeEventHash(base, GENESIS_HASH),
    );
  });

  it("changes when previousHash changes", () => {
    expect(computeEventHash(base, GENESIS_HASH)).not.toBe(
      computeEventHash(base, "0".repeat(64)),
    );
  });

  it("ignores chain links already present on the record", () => {
    const stored: StoredEvent = { ...base, hash: "x", previousHash: "y" };

    expect(computeEventHash(stored, GENESIS_HASH)).toBe(
      computeEventHash(base, GENESIS_HASH),
    );
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("returns valid for an empty event list", () => {
    expect(verifyHashChain([])).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });

  it("validates a correctly chained sequence", () => {
    const result = verifyHashChain(chainOf(3));

    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(3);
  });

  it("detects tampered event content at its position", () => {
    const events = chainOf(3);
    const second = events[1];
    if (second === undefined) throw new Error("fixture");
    events[1] = { ...second, event: { ...second.event, payload: { value: "999" } } };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
    expect(result.errors[0]?.reason).toMatch(/^Hash mismatch at position 2/);
  });

  it("detects a broken link", () => {
    const events = chainOf(3);
    const second = events[1];
    if (second === undefined) throw new Error("fixture");
    events[1] = { ...second, previousHash: "bogus" };

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors.some((e) => e.reason.startsWith("previousHash mismatch at position 2"))).toBe(true);
  });

  it("detects a removed event", () => {
    const events = chainOf(4);
    events.splice(1, 1);

    const result = verifyHashChain(events);
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toEqual({
      position: 3,
      reason: "Gap in global positions: expected 2, got 3",
    });
  });
});
