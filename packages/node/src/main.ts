/**
 * @ignition/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { JsonlEventStore } from "@ignition/event-store";
import { loadConfig, parseApiKeys, toTokenConfig } from "./config.js";
import { createBlockClock } from "./clock.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const apiKeys = new Map<string, string>();
  for (const k of parseApiKeys(config.API_KEYS)) {
    apiKeys.set(k.key, k.address);
  }
  if (apiKeys.size > 0) {
    logger.info({ apiKeyCount: apiKeys.size }, "API keys configured");
  } else {
    logger.warn("No API keys configured; trusting the X-Caller header");
  }

  const eventStore =
    config.EVENTS_PATH === undefined ? undefined : new JsonlEventStore({ filePath: config.EVENTS_PATH });
  if (eventStore !== undefined && eventStore.skippedLines > 0) {
    logger.warn({ skippedLines: eventStore.skippedLines }, "Skipped unreadable event log lines");
  }

  const { app, service } = createApp({
    serviceOptions: {
      token: toTokenConfig(config),
      clock: createBlockClock({
        genesisTime: config.GENESIS_TIME,
        blockIntervalMs: config.BLOCK_INTERVAL_MS,
      }),
      logger,
      eventStore,
      snapshotPath: config.SNAPSHOT_PATH,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    apiKeys,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, height: service.height() },
    "Ignition node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      service.stop();
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
