/**
 * @ignition/ledger — Checked 256-bit unsigned arithmetic.
 *
 * All arithmetic uses bigint and is bounded to [0, 2^256 - 1].
 * A result outside that range throws instead of wrapping.
 *
 * Rules:
 * - No floating-point operations
 * - No silent wrap-around
 * - Decimal strings are converted to/from base units via decimal scaling
 */

import { LedgerError } from "./types.js";

/** Largest representable amount. Also the unlimited-allowance sentinel. */
export const UINT256_MAX: bigint = (1n << 256n) - 1n;

// ─── Bounds ──────────────────────────────────────────────────────────────

export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= UINT256_MAX;
}

/**
 * Assert a value is a uint256. Throws LedgerError otherwise.
 */
export function assertUint256(value: bigint, label = "amount"): bigint {
  if (!isUint256(value)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be within [0, 2^256 - 1], got ${value.toString()}`,
    );
  }
  return value;
}

// ─── Checked Operations ──────────────────────────────────────────────────

export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > UINT256_MAX) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${a.toString()} + ${b.toString()} overflows uint256`,
    );
  }
  return sum;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new LedgerError(
      "ARITHMETIC_UNDERFLOW",
      `${a.toString()} - ${b.toString()} underflows uint256`,
    );
  }
  return a - b;
}

export function checkedMul(a: bigint, b: bigint): bigint {
  const product = a * b;
  if (product > UINT256_MAX) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${a.toString()} * ${b.toString()} overflows uint256`,
    );
  }
  return product;
}

/**
 * floor(a * b / divisor), with the intermediate product checked.
 *
 * Multiply-first ordering avoids precision loss.
 */
export function mulDivFloor(a: bigint, b: bigint, divisor: bigint): bigint {
  if (divisor === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Division by zero");
  }
  return checkedMul(a, b) / divisor;
}

// ─── Decimal Conversion ──────────────────────────────────────────────────

/**
 * Parse a base-unit integer string ("1500") into a uint256.
 */
export function parseUint(value: string): bigint {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid integer amount: "${value}"`);
  }
  return assertUint256(BigInt(trimmed));
}

/**
 * Parse a whole-token decimal string into base units.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * "100" with decimals=0 → 100n
 */
export function parseUnits(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  return assertUint256(BigInt(intPart + fracPart.padEnd(decimals, "0")));
}

/**
 * Convert base units to a whole-token decimal string.
 * Trailing fractional zeros are dropped.
 *
 * 1500000000000000000n with decimals=18 → "1.5"
 * 2000n with decimals=3 → "2"
 */
export function formatUnits(value: bigint, decimals: number): string {
  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals).replace(/0+$/, "");

  return fracPart === "" ? intPart : `${intPart}.${fracPart}`;
}
