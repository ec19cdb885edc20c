#!/usr/bin/env node
/**
 * Waypoint gateway entry point.
 *
 * Usage:
 *   npx tsx src/main.ts
 *   node dist/main.js
 *
 * Reads ~/.waypoint/waypoint.json when present (defaults otherwise),
 * restores sessions from the state file and serves the HTTP API.
 */

import { loadConfig } from "./config/index.js";
import { startGateway } from "./gateway/index.js";
import { createLogger } from "./logging/logger.js";
import { SessionStore } from "./sessions/index.js";

const SHUTDOWN_GRACE_MS = 10_000;

function main(): void {
  const { config, path: configPath } = loadConfig({ allowMissing: true });
  const logger = createLogger(config.logging);

  logger.info(
    { configPath: configPath ?? "(defaults)", stateFile: config.sessions.stateFile },
    "starting waypoint",
  );

  const store = new SessionStore({
    stateFile: config.sessions.stateFile,
    ttlSeconds: config.sessions.ttlSeconds,
    maxUpdates: config.sessions.maxUpdates,
    onWriteFailure: config.persistence.onWriteFailure,
    logger,
  });

  const server = startGateway({
    config: config.gateway,
    store,
    logger,
    redactTokens: config.logging.redactSensitive,
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      logger.info("Server closed");
      process.exit(0);
    });
    setTimeout(() => {
      logger.warn("Forcing shutdown after grace period");
      process.exit(1);
    }, SHUTDOWN_GRACE_MS).unref();
  };

  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

main();
