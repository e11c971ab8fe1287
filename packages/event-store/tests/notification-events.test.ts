import { describe, it, expect } from "vitest";
import { isDomainEvent } from "@ignition/types";
import type { Notification } from "@ignition/types";
import {
  NOTIFICATION_SOURCES,
  sourceOf,
  toDomainEvent,
  toEventPayload,
} from "../src/notification-events.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";

const ALICE = "0x00000000000000000000000000000000000a11ce";
const BOB = "0x0000000000000000000000000000000000000b0b";
const TAG = `0x${"ab".repeat(32)}`;

const context = {
  eventId: "evt-1",
  height: 900,
  actor: ALICE,
  correlationId: "call-1",
};

describe("sourceOf", () => {
  it("routes every notification type to its facet", () => {
    expect(NOTIFICATION_SOURCES).toEqual({
      Transfer: "ledger",
      Approval: "ledger",
      FuelAllocated: "launch",
      TrajectoryCommitted: "launch",
      IgnitionBurn: "launch",
      VestingScheduled: "vesting",
      VestingClaimed: "vesting",
      MissionLogged: "mission-log",
    });
    expect(sourceOf({ type: "VestingClaimed", beneficiary: BOB, amount: 1n, totalClaimed: 1n })).toBe(
      "vesting",
    );
  });
});

describe("toEventPayload", () => {
  it("turns amounts into decimal strings", () => {
    const value = (1n << 200n) + 7n;
    expect(toEventPayload({ type: "Transfer", from: ALICE, to: BOB, value })).toEqual({
      from: ALICE,
      to: BOB,
      value: value.toString(),
    });
  });

  it("keeps heights and indexes as numbers", () => {
    expect(
      toEventPayload({ type: "MissionLogged", index: 4, height: 17, value: 250n, tag: TAG }),
    ).toEqual({ index: 4, height: 17, value: "250", tag: TAG });

    expect(
      toEventPayload({
        type: "TrajectoryCommitted",
        height: 12,
        reserveAmount: 892n,
        treasuryAmount: 108n,
      }),
    ).toEqual({ height: 12, reserveAmount: "892", treasuryAmount: "108" });
  });
});

describe("toDomainEvent", () => {
  const notifications: Notification[] = [
    { type: "Transfer", from: ALICE, to: BOB, value: 10n },
    { type: "Approval", owner: ALICE, spender: BOB, value: 5n },
    { type: "FuelAllocated", reserve: BOB, amount: 892n },
    { type: "TrajectoryCommitted", height: 1, reserveAmount: 892n, treasuryAmount: 108n },
    { type: "IgnitionBurn", target: BOB, amount: 3n, totalBurned: 3n },
    { type: "VestingScheduled", beneficiary: BOB, amount: 100n, totalGranted: 100n },
    { type: "VestingClaimed", beneficiary: BOB, amount: 50n, totalClaimed: 50n },
    { type: "MissionLogged", index: 0, height: 1, value: 1n, tag: TAG },
  ];

  it("produces a valid domain event for every notification", () => {
    for (const n of notifications) {
      const event = toDomainEvent(n, context);
      expect(isDomainEvent(event)).toBe(true);
      expect(event.type).toBe(n.type);
      expect(event.metadata).toEqual({ ...context, source: NOTIFICATION_SOURCES[n.type] });
    }
  });

  it("stores and hashes without loss", () => {
    const store = new InMemoryEventStore();
    for (const n of notifications) {
      const event = toDomainEvent(n, context);
      store.append(event.metadata.source, [event]);
    }

    expect(store.streamVersion("ledger")).toBe(2);
    expect(store.streamVersion("launch")).toBe(3);
    expect(store.streamVersion("vesting")).toBe(2);
    expect(store.streamVersion("mission-log")).toBe(1);
    expect(store.verifyIntegrity().valid).toBe(true);
  });
});
