/**
 * Token — Top-level coordinator for the fixed-supply token.
 *
 * Composes:
 * - Ledger: balances, allowances, transfer counters
 * - Launch controller: trajectory commit and ignition burns
 * - Vesting engine: escrowed grants with cliff + linear release
 * - Mission log: bounded authority log
 *
 * Every mutating call runs against a draft of the state. The call's
 * notifications are appended to the event store as one batch, and the
 * draft is swapped in only once that append has returned.
 */

import { randomUUID } from "node:crypto";
import type {
  Address,
  CallContext,
  Notification,
  NotificationSink,
} from "@ignition/types";
import { isHeight, isTag } from "@ignition/types";
import {
  allowanceKey,
  allowanceOf,
  approve as ledgerApprove,
  balanceOf as ledgerBalanceOf,
  computeSupplyReport,
  normalizeAddress,
  parseUint,
  transfer as ledgerTransfer,
  transferCountOf as ledgerTransferCountOf,
  transferFrom as ledgerTransferFrom,
} from "@ignition/ledger";
import type { SupplyReport } from "@ignition/ledger";
import type { EventStore } from "@ignition/event-store";
import { toDomainEvent } from "@ignition/event-store";
import type {
  CallReceipt,
  IgnitionBurnResult,
  LaunchPhase,
  MissionLogEntry,
  TokenConfig,
  TokenSnapshot,
  TokenState,
  TokenStatus,
  TrajectoryAllocation,
  VestingGrant,
  VestingSchedule,
} from "./types.js";
import { MISSION_LOG_CAPACITY, TokenError } from "./types.js";
import {
  cloneTokenState,
  createTokenState,
  normalizeConfig,
  normalizeContext,
  normalizeHeight,
  phaseOrdinal,
} from "./state.js";
import {
  commitTrajectory,
  executeIgnitionBurn,
  isLaunchUnlocked,
} from "./launch-controller.js";
import {
  claimVested,
  computeClaimable,
  grantOf,
  scheduleVesting,
  vestingScheduleOf,
} from "./vesting.js";
import {
  getMissionLogEntry,
  logMission,
  missionLogLength,
} from "./mission-log.js";

// =============================================================================
// Options
// =============================================================================

export interface TokenOptions {
  /** Receives every notification, one event per notification. */
  readonly eventStore?: EventStore;
  /** Correlation ID source. Default: randomUUID */
  readonly generateId?: () => string;
  /** Height recorded on the genesis mint. Default: 0 */
  readonly genesisHeight?: number;
}

const GENESIS_CORRELATION_ID = "genesis";

// =============================================================================
// Token
// =============================================================================

export class Token {
  private state: TokenState;
  private readonly eventStore: EventStore | undefined;
  private readonly generateId: () => string;

  private constructor(state: TokenState, options: TokenOptions) {
    this.state = state;
    this.eventStore = options.eventStore;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Mint the whole supply cap to the authority and publish the mint.
   */
  static create(config: TokenConfig, options: TokenOptions = {}): Token {
    const genesis: Notification[] = [];
    const state = createTokenState(config, { emit: (n) => void genesis.push(n) });
    const token = new Token(state, options);

    token.publish(genesis, {
      caller: state.config.authority,
      height: normalizeHeight(options.genesisHeight ?? 0),
    }, GENESIS_CORRELATION_ID);

    return token;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Ledger
  // ───────────────────────────────────────────────────────────────────────

  transfer(ctx: CallContext, to: string, amount: bigint): CallReceipt<void> {
    return this.execute(ctx, (draft, c, sink) =>
      ledgerTransfer(draft.ledger, c, to, amount, sink),
    );
  }

  approve(ctx: CallContext, spender: string, amount: bigint): CallReceipt<void> {
    return this.execute(ctx, (draft, c, sink) =>
      ledgerApprove(draft.ledger, c, spender, amount, sink),
    );
  }

  transferFrom(
    ctx: CallContext,
    from: string,
    to: string,
    amount: bigint,
  ): CallReceipt<void> {
    return this.execute(ctx, (draft, c, sink) =>
      ledgerTransferFrom(draft.ledger, c, from, to, amount, sink),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Launch
  // ───────────────────────────────────────────────────────────────────────

  commitTrajectory(ctx: CallContext): CallReceipt<TrajectoryAllocation> {
    return this.execute(ctx, commitTrajectory);
  }

  executeIgnitionBurn(ctx: CallContext, amount: bigint): CallReceipt<IgnitionBurnResult> {
    return this.execute(ctx, (draft, c, sink) =>
      executeIgnitionBurn(draft, c, amount, sink),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Vesting
  // ───────────────────────────────────────────────────────────────────────

  scheduleVesting(
    ctx: CallContext,
    beneficiary: string,
    amount: bigint,
  ): CallReceipt<VestingGrant> {
    return this.execute(ctx, (draft, c, sink) =>
      scheduleVesting(draft, c, beneficiary, amount, sink),
    );
  }

  claimVested(ctx: CallContext): CallReceipt<bigint> {
    return this.execute(ctx, claimVested);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mission log
  // ───────────────────────────────────────────────────────────────────────

  logMission(ctx: CallContext, value: bigint, tag: string): CallReceipt<number> {
    return this.execute(ctx, (draft, c, sink) =>
      logMission(draft, c, value, tag, sink),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get name(): string {
    return this.state.config.name;
  }

  get symbol(): string {
    return this.state.config.symbol;
  }

  get decimals(): number {
    return this.state.config.decimals;
  }

  get launchUnlockHeight(): number {
    return this.state.config.launchUnlockHeight;
  }

  get config(): Required<TokenConfig> {
    return this.state.config;
  }

  totalSupply(): bigint {
    return this.state.ledger.totalSupply;
  }

  balanceOf(address: string): bigint {
    return ledgerBalanceOf(this.state.ledger, normalizeAddress(address));
  }

  allowance(owner: string, spender: string): bigint {
    return allowanceOf(
      this.state.ledger,
      normalizeAddress(owner, "owner"),
      normalizeAddress(spender, "spender"),
    );
  }

  isLaunchUnlocked(height: number): boolean {
    return isLaunchUnlocked(this.state, normalizeHeight(height));
  }

  totalBurned(): bigint {
    return this.state.totalBurned;
  }

  phase(): LaunchPhase {
    return this.state.phase;
  }

  isTrajectoryCommitted(): boolean {
    return this.state.trajectoryCommitted;
  }

  missionLogLength(): number {
    return missionLogLength(this.state);
  }

  getMissionLogEntry(index: number): MissionLogEntry {
    return getMissionLogEntry(this.state, index);
  }

  getMissionLog(): readonly MissionLogEntry[] {
    return [...this.state.missionLog];
  }

  getVestingGrant(beneficiary: string): VestingGrant {
    return grantOf(this.state, normalizeAddress(beneficiary, "beneficiary"));
  }

  vestingSchedule(): VestingSchedule {
    return vestingScheduleOf(this.state);
  }

  getClaimableVested(beneficiary: string, height: number): bigint {
    return computeClaimable(
      this.getVestingGrant(beneficiary),
      normalizeHeight(height),
      vestingScheduleOf(this.state),
    );
  }

  transferCount(): number {
    return this.state.ledger.transferCount;
  }

  transferCountOf(address: string): number {
    return ledgerTransferCountOf(this.state.ledger, normalizeAddress(address));
  }

  supplyReport(): SupplyReport {
    return computeSupplyReport(this.state.ledger);
  }

  status(): TokenStatus {
    const { config } = this.state;
    return {
      name: config.name,
      symbol: config.symbol,
      decimals: config.decimals,
      totalSupply: this.totalSupply(),
      phase: this.state.phase,
      trajectoryCommitted: this.state.trajectoryCommitted,
      totalBurned: this.state.totalBurned,
      launchUnlockHeight: config.launchUnlockHeight,
      vestingStartHeight: config.vestingStartHeight,
      missionLogLength: this.missionLogLength(),
      transferCount: this.transferCount(),
      supply: this.supplyReport(),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): TokenSnapshot {
    const { config, ledger } = this.state;
    return {
      version: 1,
      config: { ...config, supplyCap: config.supplyCap.toString() },
      balances: [...ledger.balances].map(
        ([address, balance]): [Address, string] => [address, balance.toString()],
      ),
      allowances: [...ledger.allowances].map(([key, value]) => {
        const [owner = "", spender = ""] = key.split("->");
        return { owner, spender, value: value.toString() };
      }),
      transferCounts: [...ledger.transferCounts],
      transferCount: ledger.transferCount,
      phase: this.state.phase,
      trajectoryCommitted: this.state.trajectoryCommitted,
      totalBurned: this.state.totalBurned.toString(),
      grants: [...this.state.grants].map(([beneficiary, grant]) => ({
        beneficiary,
        total: grant.total.toString(),
        claimed: grant.claimed.toString(),
      })),
      missionLog: this.state.missionLog.map((entry) => ({
        ...entry,
        value: entry.value.toString(),
      })),
      asOf: new Date().toISOString(),
    };
  }

  /**
   * Restore a token without re-publishing genesis.
   */
  static fromSnapshot(snap: TokenSnapshot, options: TokenOptions = {}): Token {
    if (snap.version !== 1) {
      throw new TokenError("INVALID_CONFIG", `Unsupported snapshot version ${String(snap.version)}`);
    }

    const config = normalizeConfig({ ...snap.config, supplyCap: parseUint(snap.config.supplyCap) });
    const state = createTokenState(config, { emit: () => undefined });

    state.ledger.balances.clear();
    for (const [address, balance] of snap.balances) {
      state.ledger.balances.set(normalizeAddress(address), parseUint(balance));
    }
    for (const { owner, spender, value } of snap.allowances) {
      state.ledger.allowances.set(
        allowanceKey(normalizeAddress(owner, "owner"), normalizeAddress(spender, "spender")),
        parseUint(value),
      );
    }
    for (const [address, count] of snap.transferCounts) {
      state.ledger.transferCounts.set(normalizeAddress(address), count);
    }
    state.ledger.transferCount = snap.transferCount;

    if (phaseOrdinal(snap.phase) < 0) {
      throw new TokenError("INVALID_CONFIG", `Unknown phase "${String(snap.phase)}"`);
    }
    const committed = phaseOrdinal(snap.phase) >= phaseOrdinal("fuel-allocated");
    if (snap.trajectoryCommitted !== committed) {
      throw new TokenError(
        "INVALID_CONFIG",
        `Phase "${snap.phase}" does not match trajectoryCommitted=${String(snap.trajectoryCommitted)}`,
      );
    }
    state.phase = snap.phase;
    state.trajectoryCommitted = snap.trajectoryCommitted;
    state.totalBurned = parseUint(snap.totalBurned);

    for (const grant of snap.grants) {
      const total = parseUint(grant.total);
      const claimed = parseUint(grant.claimed);
      if (claimed > total) {
        throw new TokenError(
          "INVALID_CONFIG",
          `Grant for ${grant.beneficiary} has claimed ${claimed.toString()} of ${total.toString()}`,
        );
      }
      state.grants.set(normalizeAddress(grant.beneficiary, "beneficiary"), { total, claimed });
    }

    if (snap.missionLog.length > MISSION_LOG_CAPACITY) {
      throw new TokenError("INVALID_CONFIG", `Mission log holds more than ${MISSION_LOG_CAPACITY} entries`);
    }
    for (const [position, entry] of snap.missionLog.entries()) {
      if (entry.index !== position) {
        throw new TokenError("INVALID_CONFIG", `Mission log entry at ${position} has index ${entry.index}`);
      }
      if (!isTag(entry.tag) || !isHeight(entry.height)) {
        throw new TokenError("INVALID_CONFIG", `Mission log entry ${position} is malformed`);
      }
      state.missionLog.push({ index: entry.index, height: entry.height, tag: entry.tag, value: parseUint(entry.value) });
    }

    const supply = computeSupplyReport(state.ledger);
    if (!supply.balanced) {
      throw new TokenError(
        "INVALID_CONFIG",
        `Snapshot balances sum to ${supply.sumOfBalances.toString()}, expected ${supply.totalSupply.toString()}`,
      );
    }

    return new Token(state, options);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private execute<T>(
    ctx: CallContext,
    operation: (draft: TokenState, ctx: CallContext, sink: NotificationSink) => T,
  ): CallReceipt<T> {
    const context = normalizeContext(ctx);
    const draft = cloneTokenState(this.state);
    const notifications: Notification[] = [];

    const result = operation(draft, context, {
      emit: (n) => void notifications.push(n),
    });

    const correlationId = this.generateId();
    this.publish(notifications, context, correlationId);
    this.state = draft;

    return { result, correlationId, height: context.height, notifications };
  }

  private publish(
    notifications: readonly Notification[],
    ctx: CallContext,
    correlationId: string,
  ): void {
    if (this.eventStore === undefined) {
      return;
    }

    const batch = notifications.map((notification, i) => {
      const event = toDomainEvent(notification, {
        eventId: `${correlationId}:${i}`,
        height: ctx.height,
        actor: ctx.caller,
        correlationId,
      });
      return { streamId: event.metadata.source, event };
    });

    if (batch.length > 0) {
      this.eventStore.appendBatch(batch);
    }
  }
}
