/**
 * @ignition/ledger — Address normalisation.
 *
 * Every address entering the ledger is validated and lowercased so that
 * map lookups never depend on checksum casing.
 */

import type { Address } from "@ignition/types";
import { isAddress } from "@ignition/types";
import { LedgerError } from "./types.js";

/**
 * Validate and lowercase an address. Throws LedgerError if malformed.
 */
export function normalizeAddress(value: string, label = "address"): Address {
  if (!isAddress(value)) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid ${label}: "${value}"`);
  }
  return value.toLowerCase();
}

/**
 * Key for the flat allowance map.
 */
export function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}->${spender}`;
}
