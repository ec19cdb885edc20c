/**
 * Config loader — the main entry point for the config layer.
 *
 * Pipeline: read file → JSON5 parse → env-var substitution → Zod validation → apply defaults.
 *
 * The gateway is usable without any config file: with `allowMissing` a
 * missing file resolves to the defaults.
 */

import JSON5 from "json5";
import fs from "node:fs";
import path from "node:path";

import { applyAllDefaults, type ResolvedConfig } from "./defaults.js";
import { resolveConfigEnvVars, MissingEnvVarError } from "./env-substitution.js";
import { resolveConfigPath } from "./paths.js";
import { WaypointConfigSchema } from "./schema.js";

export { MissingEnvVarError } from "./env-substitution.js";

// ── Types ───────────────────────────────────────────────────────────

export type LoadConfigOptions = {
  /** Override config file path. */
  configPath?: string;
  /** Override env vars for `${VAR}` substitution and path resolution. */
  env?: NodeJS.ProcessEnv;
  /** Resolve to defaults instead of throwing when the file is absent. */
  allowMissing?: boolean;
};

export type ConfigResult = {
  /** Fully validated and defaulted config. */
  config: ResolvedConfig;
  /** Resolved file path that was loaded, or `null` when running on defaults. */
  path: string | null;
};

// ── Loader ──────────────────────────────────────────────────────────

/**
 * Load and validate the Waypoint config.
 *
 * @throws If the config file is missing (without `allowMissing`),
 *   malformed, or fails validation.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConfigResult {
  const env = options.env ?? process.env;
  const resolvedPath = path.resolve(options.configPath ?? resolveConfigPath(env));

  if (!fs.existsSync(resolvedPath)) {
    if (options.allowMissing) {
      return { config: applyAllDefaults({}, env), path: null };
    }
    throw new ConfigFileNotFoundError(resolvedPath);
  }

  const raw = fs.readFileSync(resolvedPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigParseError(
      resolvedPath,
      err instanceof Error ? err.message : String(err),
    );
  }

  let substituted: unknown;
  try {
    substituted = resolveConfigEnvVars(parsed ?? {}, env);
  } catch (err) {
    if (err instanceof MissingEnvVarError) throw err;
    throw new ConfigEnvSubstitutionError(
      resolvedPath,
      err instanceof Error ? err.message : String(err),
    );
  }

  const result = WaypointConfigSchema.safeParse(substituted);
  if (!result.success) {
    throw new ConfigValidationError(resolvedPath, result.error.issues);
  }

  return { config: applyAllDefaults(result.data, env), path: resolvedPath };
}

// ── Error classes ───────────────────────────────────────────────────

export class ConfigFileNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`Config file not found: ${filePath}`);
    this.name = "ConfigFileNotFoundError";
  }
}

export class ConfigParseError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly parseError: string,
  ) {
    super(`Failed to parse config file ${filePath}: ${parseError}`);
    this.name = "ConfigParseError";
  }
}

export class ConfigEnvSubstitutionError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly detail: string,
  ) {
    super(`Env substitution failed for ${filePath}: ${detail}`);
    this.name = "ConfigEnvSubstitutionError";
  }
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly filePath: string,
    public readonly issues: Array<{ path: PropertyKey[]; message: string }>,
  ) {
    const summary = issues
      .map((i) => `  - ${i.path.map(String).join(".")}: ${i.message}`)
      .join("\n");
    super(`Config validation failed for ${filePath}:\n${summary}`);
    this.name = "ConfigValidationError";
  }
}
