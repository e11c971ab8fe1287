/**
 * Tests for TokenService: call logging, snapshot persistence and the
 * restart checks against the event log.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { InMemoryEventStore, JsonlEventStore } from "@ignition/event-store";
import { TokenError } from "@ignition/launch";
import { TokenService } from "../../src/services/token-service.js";
import type { TokenServiceOptions } from "../../src/services/token-service.js";
import { loadSnapshotFile } from "../../src/services/snapshot-file.js";
import {
  ALICE,
  AUTHORITY,
  BOB,
  TOKEN_CONFIG,
  captureLogger,
  testClock,
} from "../setup.js";
import type { CapturedLogger } from "../setup.js";

let captured: CapturedLogger;

beforeEach(() => {
  captured = captureLogger("debug");
});

function options(overrides: Partial<TokenServiceOptions> = {}): TokenServiceOptions {
  let calls = 0;
  return {
    token: TOKEN_CONFIG,
    clock: testClock(),
    logger: captured.logger,
    generateId: () => `call-${++calls}`,
    ...overrides,
  };
}

function linesWith(msg: string): Record<string, unknown>[] {
  return captured.lines.filter((line) => line["msg"] === msg);
}

// =============================================================================
// Logging
// =============================================================================

describe("logging", () => {
  it("logs the genesis event and the token creation", () => {
    new TokenService(options());

    expect(linesWith("Event appended")[0]).toMatchObject({
      level: 20,
      streamId: "ledger",
      position: 1,
      type: "Transfer",
      correlationId: "genesis",
    });
    expect(linesWith("Token created")[0]).toMatchObject({
      level: 30,
      authority: AUTHORITY,
      supplyCap: "1000000",
    });
  });

  it("logs a successful call at info", () => {
    const service = new TokenService(options());
    service.transfer(AUTHORITY, ALICE, 10n);

    expect(linesWith("transfer succeeded")).toEqual([
      expect.objectContaining({
        level: 30,
        operation: "transfer",
        caller: AUTHORITY,
        height: 1,
        correlationId: "call-1",
        notifications: 1,
      }),
    ]);
  });

  it("logs a rejected call at warn and rethrows", () => {
    const service = new TokenService(options());

    expect(() => service.commitTrajectory(ALICE)).toThrow(TokenError);

    const warnings = captured.lines.filter((line) => line["level"] === 40);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({
      operation: "commitTrajectory",
      caller: ALICE,
      height: 1,
      code: "UNAUTHORIZED",
    });
  });

  it("stops logging events after stop()", () => {
    const service = new TokenService(options());
    service.stop();
    service.transfer(AUTHORITY, ALICE, 1n);

    expect(linesWith("Event appended")).toHaveLength(1);
  });
});

// =============================================================================
// Queries
// =============================================================================

describe("queries", () => {
  it("reads the height from the clock for every call", () => {
    const clock = testClock(7);
    const service = new TokenService(options({ clock }));

    clock.set(12);
    const receipt = service.transfer(AUTHORITY, ALICE, 1n);

    expect(service.height()).toBe(12);
    expect(receipt.height).toBe(12);
  });

  it("reports vesting with a lowercased beneficiary", () => {
    const service = new TokenService(options());
    service.scheduleVesting(AUTHORITY, ALICE, 100n);

    const view = service.vesting(ALICE.toUpperCase().replace("0X", "0x"));
    expect(view.beneficiary).toBe(ALICE);
    expect(view.grant).toEqual({ total: 100n, claimed: 0n });
    expect(view.claimable).toBe(0n);
  });

  it("is healthy on a fresh token", () => {
    const report = new TokenService(options()).checkHealth();

    expect(report.ready).toBe(true);
    expect(report.supply.balanced).toBe(true);
    expect(report.integrity.valid).toBe(true);
  });
});

// =============================================================================
// Persistence
// =============================================================================

describe("persistence", () => {
  let dir: string;
  let eventsPath: string;
  let snapshotPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ignition-node-"));
    eventsPath = join(dir, "events.jsonl");
    snapshotPath = join(dir, "token.snapshot.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes a snapshot at genesis", () => {
    new TokenService(options({ snapshotPath }));

    const stored = loadSnapshotFile(snapshotPath);
    expect(stored?.position).toBe(1);
    expect(stored?.snapshot.balances).toEqual([[AUTHORITY, "1000000"]]);
  });

  it("restores balances and allowances after a restart", () => {
    const first = new TokenService(
      options({ snapshotPath, eventStore: new JsonlEventStore({ filePath: eventsPath }) }),
    );
    first.transfer(AUTHORITY, ALICE, 300n);
    first.approve(ALICE, BOB, 50n);
    first.transferFrom(BOB, ALICE, BOB, 20n);
    first.stop();

    const second = new TokenService(
      options({ snapshotPath, eventStore: new JsonlEventStore({ filePath: eventsPath }) }),
    );

    expect(second.balanceOf(ALICE)).toBe(280n);
    expect(second.balanceOf(BOB)).toBe(20n);
    expect(second.allowance(ALICE, BOB)).toBe(30n);
    expect(second.eventStore.globalPosition()).toBe(4);
    expect(linesWith("Token restored from snapshot")[0]).toMatchObject({ position: 4 });
  });

  it("leaves the snapshot alone when a call fails", () => {
    const service = new TokenService(options({ snapshotPath }));
    service.transfer(AUTHORITY, ALICE, 1n);
    const before = readFileSync(snapshotPath, "utf-8");

    expect(() => service.transfer(ALICE, BOB, 2n)).toThrow();

    expect(readFileSync(snapshotPath, "utf-8")).toBe(before);
  });

  it("refuses an event log that does not match the snapshot", () => {
    new TokenService(options({ snapshotPath }));

    expect(() => new TokenService(options({ snapshotPath }))).toThrow(
      "Snapshot was taken at event position 1, but the event log is at 0",
    );
  });

  it("refuses a second genesis on a non-empty event log", () => {
    const eventStore = new InMemoryEventStore();
    new TokenService(options({ eventStore }));

    expect(() => new TokenService(options({ eventStore }))).toThrow(
      "refusing to mint a second genesis",
    );
  });

  it("rejects a tampered snapshot", () => {
    new TokenService(options({ snapshotPath }));
    const stored = JSON.parse(readFileSync(snapshotPath, "utf-8")) as { stateHash: string };
    stored.stateHash = "0".repeat(64);
    writeFileSync(snapshotPath, JSON.stringify(stored));

    expect(() => loadSnapshotFile(snapshotPath)).toThrow(/Snapshot hash mismatch/);
  });
});
