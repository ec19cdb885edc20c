/**
 * Default values for all config keys.
 *
 * Each `apply*Defaults()` function takes one optional section and returns
 * a fully populated copy of it (no mutation). `applyAllDefaults()` builds
 * the resolved config the rest of the app consumes.
 */

import type {
  GatewayConfig,
  LogLevel,
  LoggingConfig,
  PersistenceConfig,
  SessionsConfig,
  WaypointConfig,
  WriteFailurePolicy,
} from "./schema.js";
import { DEFAULT_GATEWAY_PORT, resolveGatewayPort, resolveStateFile } from "./paths.js";

// ── Constants ───────────────────────────────────────────────────────

export const DEFAULT_TTL_SECONDS = 3600;
export const DEFAULT_MAX_UPDATES = 200;
export const DEFAULT_WRITE_FAILURE_POLICY: WriteFailurePolicy = "degrade";
export const DEFAULT_GATEWAY_HOST = "0.0.0.0";
export const DEFAULT_LOG_LEVEL = "info" as const;

// ── Resolved shapes ─────────────────────────────────────────────────

export interface ResolvedSessionsConfig {
  ttlSeconds: number;
  maxUpdates: number;
  stateFile: string;
}

export interface ResolvedPersistenceConfig {
  onWriteFailure: WriteFailurePolicy;
}

export interface ResolvedGatewayConfig {
  port: number;
  host: string;
  publicBaseUrl?: string;
}

export interface ResolvedLoggingConfig {
  level: LogLevel;
  pretty: boolean;
  redactSensitive: boolean;
}

export interface ResolvedConfig {
  sessions: ResolvedSessionsConfig;
  persistence: ResolvedPersistenceConfig;
  gateway: ResolvedGatewayConfig;
  logging: ResolvedLoggingConfig;
}

// ── Sessions ────────────────────────────────────────────────────────

export function applySessionDefaults(
  sessions: SessionsConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedSessionsConfig {
  return {
    ttlSeconds: sessions.ttlSeconds ?? DEFAULT_TTL_SECONDS,
    maxUpdates: sessions.maxUpdates ?? DEFAULT_MAX_UPDATES,
    stateFile: resolveStateFile(sessions.stateFile, env),
  };
}

// ── Persistence ─────────────────────────────────────────────────────

export function applyPersistenceDefaults(
  persistence: PersistenceConfig = {},
): ResolvedPersistenceConfig {
  return {
    onWriteFailure: persistence.onWriteFailure ?? DEFAULT_WRITE_FAILURE_POLICY,
  };
}

// ── Gateway ─────────────────────────────────────────────────────────

/** `WAYPOINT_PORT` beats the configured port, which beats the default. */
export function applyGatewayDefaults(
  gateway: GatewayConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedGatewayConfig {
  return {
    port: resolveGatewayPort(gateway.port ?? DEFAULT_GATEWAY_PORT, env),
    host: gateway.host ?? DEFAULT_GATEWAY_HOST,
    publicBaseUrl: gateway.publicBaseUrl?.replace(/\/+$/, ""),
  };
}

// ── Logging ─────────────────────────────────────────────────────────

export function applyLoggingDefaults(logging: LoggingConfig = {}): ResolvedLoggingConfig {
  return {
    level: logging.level ?? DEFAULT_LOG_LEVEL,
    pretty: logging.pretty ?? false,
    redactSensitive: logging.redactSensitive ?? true,
  };
}

// ── Compose all defaults ────────────────────────────────────────────

export function applyAllDefaults(
  cfg: WaypointConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  return {
    sessions: applySessionDefaults(cfg.sessions, env),
    persistence: applyPersistenceDefaults(cfg.persistence),
    gateway: applyGatewayDefaults(cfg.gateway, env),
    logging: applyLoggingDefaults(cfg.logging),
  };
}
