/**
 * Snapshot file — the host's restart point.
 *
 * The event log cannot rebuild allowances (a spend emits no Approval), so
 * a node that persists its events also persists a snapshot after every
 * successful call. The file records the global event position it was
 * taken at and a SHA-256 hash of its canonical form.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { TokenSnapshot } from "@ignition/launch";

// =============================================================================
// Schema
// =============================================================================

const uintString = z.string().regex(/^\d+$/);
const address = z.string();

export const TokenSnapshotSchema = z.object({
  version: z.literal(1),
  config: z.object({
    name: z.string(),
    symbol: z.string(),
    decimals: z.number().int(),
    supplyCap: uintString,
    authority: address,
    ledgerAddress: address,
    liquidityReserve: address,
    treasury: address,
    burnTarget: address,
    launchUnlockHeight: z.number().int(),
    vestingStartHeight: z.number().int(),
  }),
  balances: z.array(z.tuple([address, uintString])),
  allowances: z.array(
    z.object({ owner: address, spender: address, value: uintString }),
  ),
  transferCounts: z.array(z.tuple([address, z.number().int().min(0)])),
  transferCount: z.number().int().min(0),
  phase: z.enum(["pre-ignition", "trajectory-lock", "fuel-allocated", "live"]),
  trajectoryCommitted: z.boolean(),
  totalBurned: uintString,
  grants: z.array(
    z.object({ beneficiary: address, total: uintString, claimed: uintString }),
  ),
  missionLog: z.array(
    z.object({
      index: z.number().int().min(0),
      height: z.number().int().min(0),
      value: uintString,
      tag: z.string(),
    }),
  ),
  asOf: z.string(),
});

const StoredSnapshotSchema = z.object({
  position: z.number().int().min(0),
  snapshot: TokenSnapshotSchema,
  createdAt: z.string(),
  stateHash: z.string().min(1),
});

export interface StoredTokenSnapshot {
  /** Global event position the snapshot was taken at */
  readonly position: number;
  readonly snapshot: TokenSnapshot;
  readonly createdAt: string;
  readonly stateHash: string;
}

// =============================================================================
// Hashing
// =============================================================================

export function computeSnapshotHash(snapshot: TokenSnapshot): string {
  return createHash("sha256").update(canonicalize(snapshot)).digest("hex");
}

// =============================================================================
// File I/O
// =============================================================================

/**
 * Write the snapshot beside its final path, then rename over it.
 */
export function saveSnapshotFile(
  path: string,
  snapshot: TokenSnapshot,
  position: number,
): StoredTokenSnapshot {
  const stored: StoredTokenSnapshot = {
    position,
    snapshot,
    createdAt: new Date().toISOString(),
    stateHash: computeSnapshotHash(snapshot),
  };

  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, JSON.stringify(stored, null, 2), "utf-8");
  renameSync(tmp, path);

  return stored;
}

/**
 * @returns The stored snapshot, or undefined if the file does not exist
 * @throws if the file is not a valid snapshot or its hash does not match
 */
export function loadSnapshotFile(path: string): StoredTokenSnapshot | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  const stored = StoredSnapshotSchema.parse(raw);

  if (computeSnapshotHash(stored.snapshot) !== stored.stateHash) {
    throw new Error(`Snapshot hash mismatch in ${path}`);
  }

  return stored;
}
