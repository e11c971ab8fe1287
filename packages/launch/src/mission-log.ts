/**
 * Mission Log — Bounded, append-only record of authority entries.
 *
 * Each entry captures the height it was written at, a uint256 value and
 * an opaque 32-byte tag. Indices are stable once written.
 */

import type { CallContext, NotificationSink } from "@ignition/types";
import { isTag } from "@ignition/types";
import { assertUint256 } from "@ignition/ledger";
import type { MissionLogEntry, TokenState } from "./types.js";
import { MISSION_LOG_CAPACITY, TokenError } from "./types.js";
import { assertAuthority } from "./state.js";

export function logMission(
  state: TokenState,
  ctx: CallContext,
  value: bigint,
  tag: string,
  sink: NotificationSink,
): number {
  assertAuthority(state, ctx, "write to the mission log");

  if (state.missionLog.length >= MISSION_LOG_CAPACITY) {
    throw new TokenError(
      "MISSION_LOG_FULL",
      `Mission log is full (${MISSION_LOG_CAPACITY} entries)`,
    );
  }

  assertUint256(value, "value");
  if (!isTag(tag)) {
    throw new TokenError("INVALID_TAG", `Tag must be 0x followed by 64 hex digits, got "${tag}"`);
  }

  const entry: MissionLogEntry = {
    index: state.missionLog.length,
    height: ctx.height,
    value,
    tag: tag.toLowerCase(),
  };
  state.missionLog.push(entry);

  sink.emit({ type: "MissionLogged", ...entry });

  return entry.index;
}

export function missionLogLength(state: TokenState): number {
  return state.missionLog.length;
}

export function getMissionLogEntry(state: TokenState, index: number): MissionLogEntry {
  const entry = Number.isInteger(index) && index >= 0 ? state.missionLog[index] : undefined;
  if (entry === undefined) {
    throw new TokenError(
      "INDEX_OUT_OF_BOUNDS",
      `No mission log entry at index ${index} (length ${state.missionLog.length})`,
    );
  }
  return entry;
}
