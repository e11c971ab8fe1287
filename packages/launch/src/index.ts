/**
 * @ignition/launch — Launch controller, vesting engine and mission log.
 *
 * Provides:
 * - Token: the coordinator that owns the aggregate state and runs every
 *   call against a draft, publishing notifications on success
 * - commitTrajectory / executeIgnitionBurn: one-shot allocation and burns
 * - scheduleVesting / claimVested / computeClaimable: escrowed grants
 * - logMission / getMissionLogEntry: the bounded authority log
 */

export { Token } from "./token.js";
export type { TokenOptions } from "./token.js";

export {
  createTokenState,
  cloneTokenState,
  normalizeConfig,
  normalizeContext,
  assertAuthority,
  advancePhase,
  phaseOrdinal,
} from "./state.js";

export {
  computeAllocation,
  commitTrajectory,
  executeIgnitionBurn,
  isLaunchUnlocked,
} from "./launch-controller.js";

export {
  vestedAmount,
  computeClaimable,
  scheduleVesting,
  claimVested,
  grantOf,
  vestingScheduleOf,
} from "./vesting.js";

export {
  logMission,
  missionLogLength,
  getMissionLogEntry,
} from "./mission-log.js";

export {
  RESERVE_BPS,
  TREASURY_BPS,
  BPS_DENOMINATOR,
  VESTING_CLIFF,
  VESTING_DURATION,
  MISSION_LOG_CAPACITY,
  LAUNCH_PHASES,
  TokenError,
} from "./types.js";

export type {
  LaunchPhase,
  TokenConfig,
  VestingGrant,
  VestingSchedule,
  MissionLogEntry,
  TokenState,
  TrajectoryAllocation,
  IgnitionBurnResult,
  CallReceipt,
  TokenStatus,
  TokenSnapshot,
  TokenErrorCode,
} from "./types.js";
