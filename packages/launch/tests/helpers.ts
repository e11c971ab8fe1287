/**
 * Shared fixtures for launch tests.
 */

import type { CallContext, Notification, NotificationSink } from "@ignition/types";
import { LedgerError } from "@ignition/ledger";
import type { TokenConfig } from "../src/types.js";
import { TokenError } from "../src/types.js";

export const AUTHORITY = "0x00000000000000000000000000000000000000a0";
export const LEDGER = "0x00000000000000000000000000000000000000e5";
export const RESERVE = "0x00000000000000000000000000000000000000f1";
export const TREASURY = "0x00000000000000000000000000000000000000f2";
export const ALICE = "0x00000000000000000000000000000000000a11ce";
export const BOB = "0x0000000000000000000000000000000000000b0b";

export const START = 1_000;

export const CONFIG: TokenConfig = {
  name: "Test Ignition",
  symbol: "TIGN",
  decimals: 18,
  supplyCap: 1_000_000n,
  authority: AUTHORITY,
  ledgerAddress: LEDGER,
  liquidityReserve: RESERVE,
  treasury: TREASURY,
  launchUnlockHeight: 500,
  vestingStartHeight: START,
};

export function ctx(caller: string, height = 1): CallContext {
  return { caller, height };
}

export function tag(byte: string): string {
  return `0x${byte.repeat(32)}`;
}

export function collector(): NotificationSink & { readonly emitted: Notification[] } {
  const emitted: Notification[] = [];
  return { emitted, emit: (n) => void emitted.push(n) };
}

/**
 * Run `fn` and return the code of the TokenError or LedgerError it threw.
 */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof TokenError || err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}
