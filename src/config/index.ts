/**
 * Config layer — public API.
 *
 * @example
 * ```ts
 * import { loadConfig } from "./config/index.js";
 *
 * const { config } = loadConfig({ allowMissing: true });
 * console.log(config.sessions.ttlSeconds); // 3600
 * console.log(config.gateway.port);        // 5000
 * ```
 */

export {
  loadConfig,
  ConfigFileNotFoundError,
  ConfigParseError,
  ConfigEnvSubstitutionError,
  ConfigValidationError,
  MissingEnvVarError,
  type LoadConfigOptions,
  type ConfigResult,
} from "./loader.js";

export {
  WaypointConfigSchema,
  type WaypointConfig,
  type SessionsConfig,
  type PersistenceConfig,
  type WriteFailurePolicy,
  type GatewayConfig,
  type LoggingConfig,
  type LogLevel,
} from "./schema.js";

export {
  resolveStateDir,
  resolveConfigPath,
  resolveStateFile,
  resolveGatewayPort,
  ensureDir,
  DEFAULT_GATEWAY_PORT,
} from "./paths.js";

export { resolveConfigEnvVars } from "./env-substitution.js";

export {
  applyAllDefaults,
  DEFAULT_TTL_SECONDS,
  DEFAULT_MAX_UPDATES,
  DEFAULT_LOG_LEVEL,
  type ResolvedConfig,
  type ResolvedSessionsConfig,
  type ResolvedGatewayConfig,
  type ResolvedLoggingConfig,
} from "./defaults.js";
