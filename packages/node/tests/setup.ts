/**
 * Test helpers for @ignition/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { TokenConfig } from "@ignition/launch";
import type { EventStore } from "@ignition/event-store";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import type { BlockClock } from "../src/clock.js";

export const AUTHORITY = "0x00000000000000000000000000000000000000a0";
export const LEDGER = "0x00000000000000000000000000000000000000e5";
export const RESERVE = "0x00000000000000000000000000000000000000f1";
export const TREASURY = "0x00000000000000000000000000000000000000f2";
export const ALICE = "0x00000000000000000000000000000000000a11ce";
export const BOB = "0x0000000000000000000000000000000000000b0b";

export const VESTING_START = 100;

export const TOKEN_CONFIG: TokenConfig = {
  name: "Test Ignition",
  symbol: "TIGN",
  decimals: 18,
  supplyCap: 1_000_000n,
  authority: AUTHORITY,
  ledgerAddress: LEDGER,
  liquidityReserve: RESERVE,
  treasury: TREASURY,
  launchUnlockHeight: 50,
  vestingStartHeight: VESTING_START,
};

// =============================================================================
// Clock & Logger
// =============================================================================

export interface TestClock extends BlockClock {
  set(height: number): void;
}

export function testClock(start = 1): TestClock {
  let current = start;
  return {
    height: () => current,
    set: (height) => {
      current = height;
    },
  };
}

export interface CapturedLogger {
  readonly logger: Logger;
  readonly lines: Record<string, unknown>[];
}

/**
 * A pino logger writing parsed JSON lines into an array.
 */
export function captureLogger(level = "debug"): CapturedLogger {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level },
    {
      write: (msg: string) => {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      },
    },
  );
  return { logger, lines };
}

// =============================================================================
// App
// =============================================================================

export interface TestAppOptions {
  readonly eventStore?: EventStore;
  readonly snapshotPath?: string;
  readonly apiKeys?: ReadonlyMap<string, string>;
  readonly logFn?: CreateAppOptions["logFn"];
  readonly logger?: Logger;
}

export interface TestApp extends AppInstance {
  readonly clock: TestClock;
}

/**
 * Create a test app with silent logging and sequential correlation IDs.
 */
export function createTestApp(options: TestAppOptions = {}): TestApp {
  const clock = testClock();
  let calls = 0;

  const instance = createApp({
    serviceOptions: {
      token: TOKEN_CONFIG,
      clock,
      logger: options.logger ?? pino({ level: "silent" }),
      eventStore: options.eventStore,
      snapshotPath: options.snapshotPath,
      generateId: () => `call-${++calls}`,
    },
    logFn: options.logFn,
    apiKeys: options.apiKeys,
  });

  return { ...instance, clock };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * POST as `caller` in open mode.
 */
export function callAs(caller: string, path: string, body: unknown = {}): Request {
  return jsonRequest(path, "POST", body, { "X-Caller": caller });
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}
