/**
 * @ignition/node — Reference HTTP host for the token.
 *
 * Import from here to embed the app; run main.ts to serve it.
 */

export { TokenService } from "./services/token-service.js";
export type {
  TokenServiceOptions,
  VestingView,
  HealthReport,
} from "./services/token-service.js";
export {
  TokenSnapshotSchema,
  computeSnapshotHash,
  saveSnapshotFile,
  loadSnapshotFile,
} from "./services/snapshot-file.js";
export type { StoredTokenSnapshot } from "./services/snapshot-file.js";
export { createBlockClock } from "./clock.js";
export type { BlockClock, BlockClockOptions } from "./clock.js";
export { loadConfig, parseApiKeys, toTokenConfig, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
