/**
 * @ignition/ledger — Internal types for the balance engine.
 *
 * Rules:
 * - All amounts are bigint in [0, 2^256 - 1]
 * - Addresses stored here are already lowercase
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "@ignition/types";

// ─── Ledger State ────────────────────────────────────────────────────────

/**
 * Balance and allowance storage.
 *
 * A flat keyed store: balances by address, allowances by
 * owner/spender key, transfer counters by sender.
 */
export interface LedgerState {
  /** Fixed at construction. Equal to the sum of all balances. */
  readonly totalSupply: bigint;
  readonly balances: Map<Address, bigint>;
  /** Keyed by `allowanceKey(owner, spender)` */
  readonly allowances: Map<string, bigint>;
  /** Number of moves sent by each address */
  readonly transferCounts: Map<Address, number>;
  /** Number of moves across all addresses */
  transferCount: number;
}

/**
 * Initial holder of the whole supply.
 */
export interface LedgerGenesis {
  readonly holder: Address;
  readonly totalSupply: bigint;
}

// ─── Supply Report ───────────────────────────────────────────────────────

/**
 * A single non-zero balance line.
 */
export interface HolderBalance {
  readonly address: Address;
  readonly balance: bigint;
}

/**
 * The supply check: balances must sum to the total supply.
 */
export interface SupplyReport {
  readonly totalSupply: bigint;
  readonly sumOfBalances: bigint;
  /** Addresses holding a non-zero balance */
  readonly holders: number;
  /** Whether the sum of balances equals the total supply */
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_RECIPIENT"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW";

/**
 * Structured error from the ledger engine.
 * Always thrown; operations never return error codes.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
