/**
 * Standard directory and config path resolution.
 *
 * State dir:  ~/.waypoint/                    (session state, backups)
 * Config:     ~/.waypoint/waypoint.json
 * State file: ~/.waypoint/session-state.json
 *
 * Override via env vars:
 *   WAYPOINT_STATE_DIR   — override state directory
 *   WAYPOINT_CONFIG_PATH — override config file path
 *   WAYPOINT_PORT        — override gateway port
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";

const STATE_DIRNAME = ".waypoint";
const CONFIG_FILENAME = "waypoint.json";
const STATE_FILENAME = "session-state.json";

// ── Home directory ──────────────────────────────────────────────────

function resolveHomeDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.WAYPOINT_HOME?.trim();
  if (override) return override;
  return os.homedir();
}

// ── Tilde expansion ─────────────────────────────────────────────────

function expandTilde(filepath: string, home: string): string {
  if (filepath === "~") return home;
  if (filepath.startsWith("~/") || filepath.startsWith("~\\")) {
    return path.join(home, filepath.slice(2));
  }
  return filepath;
}

export function resolveUserPath(
  input: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  return path.resolve(expandTilde(trimmed, resolveHomeDir(env)));
}

// ── State directory ─────────────────────────────────────────────────

/**
 * Resolve the state directory for mutable data.
 *
 * Override: `WAYPOINT_STATE_DIR` env var.
 * Default:  `~/.waypoint`
 */
export function resolveStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.WAYPOINT_STATE_DIR?.trim();
  if (override) return resolveUserPath(override, env);
  return path.join(resolveHomeDir(env), STATE_DIRNAME);
}

// ── Config file path ────────────────────────────────────────────────

/**
 * Resolve the config file path (JSON5).
 *
 * Override: `WAYPOINT_CONFIG_PATH` env var.
 * Default:  `~/.waypoint/waypoint.json`
 */
export function resolveConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  stateDir: string = resolveStateDir(env),
): string {
  const override = env.WAYPOINT_CONFIG_PATH?.trim();
  if (override) return resolveUserPath(override, env);
  return path.join(stateDir, CONFIG_FILENAME);
}

// ── Session state file ──────────────────────────────────────────────

/** Durable session snapshot. A configured path wins over the state dir. */
export function resolveStateFile(
  configured?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (configured?.trim()) return resolveUserPath(configured, env);
  return path.join(resolveStateDir(env), STATE_FILENAME);
}

// ── Ensure dirs ─────────────────────────────────────────────────────

/**
 * Ensure a directory exists, creating it recursively if needed.
 */
export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

// ── Gateway port ────────────────────────────────────────────────────

export const DEFAULT_GATEWAY_PORT = 5000;

/**
 * Resolve the gateway port.
 * Priority: env `WAYPOINT_PORT` → config → default.
 */
export function resolveGatewayPort(
  configPort?: number,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const envRaw = env.WAYPOINT_PORT?.trim();
  if (envRaw) {
    const parsed = Number.parseInt(envRaw, 10);
    if (Number.isFinite(parsed) && parsed > 0) return parsed;
  }
  if (typeof configPort === "number" && Number.isFinite(configPort) && configPort > 0) {
    return configPort;
  }
  return DEFAULT_GATEWAY_PORT;
}
