/**
 * Address Types
 *
 * Identities on the ledger are 20-byte hex addresses. Mission log tags
 * are 32-byte hex labels (typically a content hash).
 *
 * Rules:
 * - Addresses are compared in lowercase
 * - The null address never holds an identity of its own
 * - Amounts are never carried here; see the ledger package
 */

/**
 * A `0x`-prefixed, 40 hex digit account address.
 */
export type Address = string;

/**
 * A `0x`-prefixed, 64 hex digit opaque label.
 */
export type Tag = string;

/** The all-zero address. Never a valid recipient or beneficiary. */
export const NULL_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** Conventional unspendable destination for burns. */
export const DEAD_ADDRESS: Address = "0x000000000000000000000000000000000000dead";
