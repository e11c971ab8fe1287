/**
 * TokenService — Composition root for the token and its event stream.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service owns the single Token instance, reads
 * the height from the block clock for every call, and keeps the
 * snapshot file (when configured) in step with the event log.
 */

import type { Logger } from "pino";
import { LedgerError } from "@ignition/ledger";
import type { SupplyReport } from "@ignition/ledger";
import { Token, TokenError } from "@ignition/launch";
import type {
  CallReceipt,
  IgnitionBurnResult,
  MissionLogEntry,
  TokenConfig,
  TokenStatus,
  TrajectoryAllocation,
  VestingGrant,
  VestingSchedule,
} from "@ignition/launch";
import type { CallContext } from "@ignition/types";
import { InMemoryEventStore } from "@ignition/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "@ignition/event-store";
import type { BlockClock } from "../clock.js";
import { loadSnapshotFile, saveSnapshotFile } from "./snapshot-file.js";

// =============================================================================
// Configuration
// =============================================================================

export interface TokenServiceOptions {
  readonly token: TokenConfig;
  readonly clock: BlockClock;
  readonly logger: Logger;
  /** Default: a fresh InMemoryEventStore */
  readonly eventStore?: EventStore | undefined;
  /** Where to keep the restart snapshot. Omit to run without one. */
  readonly snapshotPath?: string | undefined;
  readonly generateId?: (() => string) | undefined;
}

export interface VestingView {
  readonly beneficiary: string;
  readonly grant: VestingGrant;
  readonly claimable: bigint;
  readonly height: number;
  readonly schedule: VestingSchedule;
}

export interface HealthReport {
  readonly ready: boolean;
  readonly supply: SupplyReport;
  readonly integrity: EventStoreIntegrityResult;
}

// =============================================================================
// Service
// =============================================================================

export class TokenService {
  readonly eventStore: EventStore;

  private readonly token: Token;
  private readonly clock: BlockClock;
  private readonly logger: Logger;
  private readonly snapshotPath: string | undefined;
  private readonly subscription: Subscription;

  constructor(options: TokenServiceOptions) {
    this.eventStore = options.eventStore ?? new InMemoryEventStore();
    this.clock = options.clock;
    this.logger = options.logger;
    this.snapshotPath = options.snapshotPath;

    this.subscription = this.eventStore.subscribeAll((stored) => {
      this.logger.debug(
        {
          streamId: stored.streamId,
          position: stored.globalPosition,
          type: stored.event.type,
          correlationId: stored.event.metadata.correlationId,
        },
        "Event appended",
      );
    });

    this.token = this.openToken(options);
  }

  // ─── Ledger ──────────────────────────────────────────────────────────

  transfer(caller: string, to: string, amount: bigint): CallReceipt<void> {
    return this.call("transfer", caller, (ctx) => this.token.transfer(ctx, to, amount));
  }

  approve(caller: string, spender: string, amount: bigint): CallReceipt<void> {
    return this.call("approve", caller, (ctx) => this.token.approve(ctx, spender, amount));
  }

  transferFrom(caller: string, from: string, to: string, amount: bigint): CallReceipt<void> {
    return this.call("transferFrom", caller, (ctx) =>
      this.token.transferFrom(ctx, from, to, amount),
    );
  }

  // ─── Launch ──────────────────────────────────────────────────────────

  commitTrajectory(caller: string): CallReceipt<TrajectoryAllocation> {
    return this.call("commitTrajectory", caller, (ctx) => this.token.commitTrajectory(ctx));
  }

  executeIgnitionBurn(caller: string, amount: bigint): CallReceipt<IgnitionBurnResult> {
    return this.call("executeIgnitionBurn", caller, (ctx) =>
      this.token.executeIgnitionBurn(ctx, amount),
    );
  }

  // ─── Vesting ─────────────────────────────────────────────────────────

  scheduleVesting(caller: string, beneficiary: string, amount: bigint): CallReceipt<VestingGrant> {
    return this.call("scheduleVesting", caller, (ctx) =>
      this.token.scheduleVesting(ctx, beneficiary, amount),
    );
  }

  claimVested(caller: string): CallReceipt<bigint> {
    return this.call("claimVested", caller, (ctx) => this.token.claimVested(ctx));
  }

  // ─── Mission Log ─────────────────────────────────────────────────────

  logMission(caller: string, value: bigint, tag: string): CallReceipt<number> {
    return this.call("logMission", caller, (ctx) => this.token.logMission(ctx, value, tag));
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  height(): number {
    return this.clock.height();
  }

  status(): TokenStatus {
    return this.token.status();
  }

  isLaunchUnlocked(height: number): boolean {
    return this.token.isLaunchUnlocked(height);
  }

  balanceOf(address: string): bigint {
    return this.token.balanceOf(address);
  }

  transferCountOf(address: string): number {
    return this.token.transferCountOf(address);
  }

  allowance(owner: string, spender: string): bigint {
    return this.token.allowance(owner, spender);
  }

  vesting(beneficiary: string): VestingView {
    const height = this.height();
    return {
      beneficiary: beneficiary.toLowerCase(),
      grant: this.token.getVestingGrant(beneficiary),
      claimable: this.token.getClaimableVested(beneficiary, height),
      height,
      schedule: this.token.vestingSchedule(),
    };
  }

  missionLog(): readonly MissionLogEntry[] {
    return this.token.getMissionLog();
  }

  missionLogEntry(index: number): MissionLogEntry {
    return this.token.getMissionLogEntry(index);
  }

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  /**
   * Ready when balances sum to the supply and the event chain verifies.
   */
  checkHealth(): HealthReport {
    const supply = this.token.supplyReport();
    const integrity = this.eventStore.verifyIntegrity();
    return { ready: supply.balanced && integrity.valid, supply, integrity };
  }

  stop(): void {
    this.subscription.unsubscribe();
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private openToken(options: TokenServiceOptions): Token {
    const tokenOptions = {
      eventStore: this.eventStore,
      ...(options.generateId !== undefined ? { generateId: options.generateId } : {}),
    };
    const position = this.eventStore.globalPosition();
    const stored =
      this.snapshotPath === undefined ? undefined : loadSnapshotFile(this.snapshotPath);

    if (stored !== undefined) {
      if (stored.position !== position) {
        throw new Error(
          `Snapshot was taken at event position ${stored.position}, but the event log is at ${position}`,
        );
      }
      this.logger.info({ position }, "Token restored from snapshot");
      return Token.fromSnapshot(stored.snapshot, tokenOptions);
    }

    if (position > 0) {
      throw new Error(
        `Event log already holds ${position} events but no snapshot was found; refusing to mint a second genesis`,
      );
    }

    const token = Token.create(options.token, {
      ...tokenOptions,
      genesisHeight: this.clock.height(),
    });
    this.persist(token);
    this.logger.info(
      { authority: token.config.authority, supplyCap: token.totalSupply().toString() },
      "Token created",
    );
    return token;
  }

  private call<T>(
    operation: string,
    caller: string,
    run: (ctx: CallContext) => CallReceipt<T>,
  ): CallReceipt<T> {
    const ctx: CallContext = { caller, height: this.clock.height() };

    try {
      const receipt = run(ctx);
      this.persist(this.token);
      this.logger.info(
        {
          operation,
          caller,
          height: receipt.height,
          correlationId: receipt.correlationId,
          notifications: receipt.notifications.length,
        },
        `${operation} succeeded`,
      );
      return receipt;
    } catch (err) {
      if (err instanceof TokenError || err instanceof LedgerError) {
        this.logger.warn({ operation, caller, height: ctx.height, code: err.code }, err.message);
      }
      throw err;
    }
  }

  private persist(token: Token): void {
    if (this.snapshotPath !== undefined) {
      saveSnapshotFile(this.snapshotPath, token.snapshot(), this.eventStore.globalPosition());
    }
  }
}
