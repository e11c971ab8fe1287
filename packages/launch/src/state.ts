/**
 * TokenState construction, copying and shared guards.
 */

import type { Address, CallContext, NotificationSink } from "@ignition/types";
import { DEAD_ADDRESS, NULL_ADDRESS, isAddress, isHeight, isNullAddress } from "@ignition/types";
import { cloneLedgerState, createLedgerState, isUint256 } from "@ignition/ledger";
import type { LaunchPhase, TokenConfig, TokenState } from "./types.js";
import { LAUNCH_PHASES, TokenError } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

function configAddress(value: string, field: string): Address {
  if (!isAddress(value)) {
    throw new TokenError("INVALID_CONFIG", `${field} is not an address: "${value}"`);
  }
  return value.toLowerCase();
}

function configHeight(value: number, field: string): number {
  if (!isHeight(value)) {
    throw new TokenError("INVALID_CONFIG", `${field} must be a non-negative integer, got ${value}`);
  }
  return value;
}

/**
 * Validate a config and resolve its defaults.
 */
export function normalizeConfig(config: TokenConfig): Required<TokenConfig> {
  if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > 255) {
    throw new TokenError("INVALID_CONFIG", `decimals must be an integer in [0, 255], got ${config.decimals}`);
  }
  if (!isUint256(config.supplyCap)) {
    throw new TokenError("INVALID_CONFIG", `supplyCap is outside uint256: ${config.supplyCap.toString()}`);
  }

  const authority = configAddress(config.authority, "authority");
  const ledgerAddress = configAddress(config.ledgerAddress, "ledgerAddress");

  if (isNullAddress(authority)) {
    throw new TokenError("INVALID_CONFIG", "authority cannot be the null address");
  }
  if (isNullAddress(ledgerAddress)) {
    throw new TokenError("INVALID_CONFIG", "ledgerAddress cannot be the null address");
  }
  if (ledgerAddress === authority) {
    throw new TokenError("INVALID_CONFIG", "ledgerAddress must differ from the authority");
  }

  const burnTarget =
    config.burnTarget === undefined ? DEAD_ADDRESS : configAddress(config.burnTarget, "burnTarget");

  return {
    name: config.name,
    symbol: config.symbol,
    decimals: config.decimals,
    supplyCap: config.supplyCap,
    authority,
    ledgerAddress,
    liquidityReserve: configAddress(config.liquidityReserve, "liquidityReserve"),
    treasury: configAddress(config.treasury, "treasury"),
    burnTarget: isNullAddress(burnTarget) ? DEAD_ADDRESS : burnTarget,
    launchUnlockHeight: configHeight(config.launchUnlockHeight, "launchUnlockHeight"),
    vestingStartHeight: configHeight(config.vestingStartHeight, "vestingStartHeight"),
  };
}

// =============================================================================
// State
// =============================================================================

/**
 * Build the genesis state: the whole cap belongs to the authority.
 * Emits the mint as a Transfer from the null address.
 */
export function createTokenState(config: TokenConfig, sink: NotificationSink): TokenState {
  const resolved = normalizeConfig(config);
  const ledger = createLedgerState({
    holder: resolved.authority,
    totalSupply: resolved.supplyCap,
  });

  sink.emit({
    type: "Transfer",
    from: NULL_ADDRESS,
    to: resolved.authority,
    value: resolved.supplyCap,
  });

  return {
    config: resolved,
    ledger,
    phase: "pre-ignition",
    trajectoryCommitted: false,
    totalBurned: 0n,
    grants: new Map(),
    missionLog: [],
  };
}

/**
 * Copy a state so a call can run against a draft.
 * Grants and log entries are immutable values, so shallow copies suffice.
 */
export function cloneTokenState(state: TokenState): TokenState {
  return {
    config: state.config,
    ledger: cloneLedgerState(state.ledger),
    phase: state.phase,
    trajectoryCommitted: state.trajectoryCommitted,
    totalBurned: state.totalBurned,
    grants: new Map(state.grants),
    missionLog: [...state.missionLog],
  };
}

// =============================================================================
// Guards
// =============================================================================

/**
 * Validate and normalise a host-supplied call context.
 */
export function normalizeContext(ctx: CallContext): CallContext {
  if (!isAddress(ctx.caller)) {
    throw new TokenError("INVALID_CONTEXT", `Caller is not an address: "${ctx.caller}"`);
  }
  return { caller: ctx.caller.toLowerCase(), height: normalizeHeight(ctx.height) };
}

export function normalizeHeight(height: number): number {
  if (!isHeight(height)) {
    throw new TokenError("INVALID_CONTEXT", `Height must be a non-negative integer, got ${height}`);
  }
  return height;
}

export function assertAuthority(state: TokenState, ctx: CallContext, operation: string): void {
  if (ctx.caller.toLowerCase() !== state.config.authority) {
    throw new TokenError("UNAUTHORIZED", `Only the authority may ${operation}`);
  }
}

export function phaseOrdinal(phase: LaunchPhase): number {
  return LAUNCH_PHASES.indexOf(phase);
}

/**
 * Move the phase forward. Never moves backwards.
 */
export function advancePhase(state: TokenState, next: LaunchPhase): void {
  if (phaseOrdinal(next) < phaseOrdinal(state.phase)) {
    throw new TokenError(
      "TRAJECTORY_ALREADY_COMMITTED",
      `Cannot return from phase "${state.phase}" to "${next}"`,
    );
  }
  state.phase = next;
}
