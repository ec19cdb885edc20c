/**
 * Application logger.
 *
 * A single pino root logger per process; components receive it explicitly
 * and derive `child({ component })` loggers from it.
 */

import pino, { type Logger } from "pino";

import type { ResolvedLoggingConfig } from "../config/defaults.js";

export type { Logger } from "pino";

/** Fields carrying session tokens, which are the only session credential. */
export const SENSITIVE_PATHS = ["token", "*.token"];

export function createLogger(
  config: ResolvedLoggingConfig,
  destination?: pino.DestinationStream,
): Logger {
  const options: pino.LoggerOptions = {
    name: "waypoint",
    level: config.level,
    redact: config.redactSensitive
      ? { paths: SENSITIVE_PATHS, censor: "[redacted]" }
      : undefined,
  };

  if (config.pretty && !destination) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true },
      },
    });
  }

  return destination ? pino(options, destination) : pino(options);
}

/** Logger that drops everything — the default when none is injected. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
