/**
 * @ignition/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress } from "@ignition/types";
import { parseUnits } from "@ignition/ledger";
import type { TokenConfig } from "@ignition/launch";

// =============================================================================
// Schema
// =============================================================================

const address = z.string().refine(isAddress, {
  message: "Expected 0x followed by 40 hex digits",
});

const height = z.coerce.number().int().min(0);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Token
  TOKEN_NAME: z.string().min(1).default("Ignition"),
  TOKEN_SYMBOL: z.string().min(1).default("IGN"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(255).default(18),
  /** Whole tokens; scaled by TOKEN_DECIMALS */
  SUPPLY_CAP: z.string().regex(/^\d+(\.\d+)?$/).default("1000000000"),
  AUTHORITY_ADDRESS: address,
  LEDGER_ADDRESS: address,
  LIQUIDITY_RESERVE_ADDRESS: address,
  TREASURY_ADDRESS: address,
  BURN_TARGET_ADDRESS: address.optional(),
  LAUNCH_UNLOCK_HEIGHT: height.default(0),
  VESTING_START_HEIGHT: height.default(0),

  // Block clock
  GENESIS_TIME: z.coerce.date().default(() => new Date(0)),
  BLOCK_INTERVAL_MS: z.coerce.number().int().min(1).default(12_000),

  // Auth
  API_KEYS: z.string().default(""),

  // Persistence
  EVENTS_PATH: z.string().min(1).optional(),
  SNAPSHOT_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  /** Caller address the key acts as */
  readonly address: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:0xaddress1,key2:0xaddress2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, address, ...rest] = entry.trim().split(":");
    if (key === undefined || address === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }

    keys.push({ key, address: address.toLowerCase() });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Build the core token config. SUPPLY_CAP is scaled to base units.
 */
export function toTokenConfig(config: AppConfig): TokenConfig {
  const base = {
    name: config.TOKEN_NAME,
    symbol: config.TOKEN_SYMBOL,
    decimals: config.TOKEN_DECIMALS,
    supplyCap: parseUnits(config.SUPPLY_CAP, config.TOKEN_DECIMALS),
    authority: config.AUTHORITY_ADDRESS,
    ledgerAddress: config.LEDGER_ADDRESS,
    liquidityReserve: config.LIQUIDITY_RESERVE_ADDRESS,
    treasury: config.TREASURY_ADDRESS,
    launchUnlockHeight: config.LAUNCH_UNLOCK_HEIGHT,
    vestingStartHeight: config.VESTING_START_HEIGHT,
  };

  return config.BURN_TARGET_ADDRESS === undefined
    ? base
    : { ...base, burnTarget: config.BURN_TARGET_ADDRESS };
}
