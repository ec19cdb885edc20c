/**
 * Zod schema for the Waypoint config file (~/.waypoint/waypoint.json).
 *
 * Every section is optional: a missing or empty config file runs the
 * gateway on defaults. Objects are `.strict()` so typos fail loudly.
 */

import { z } from "zod";

// ── Sessions ────────────────────────────────────────────────────────

export const SessionsSchema = z
  .object({
    /** Lifetime of a session from creation. Default: 3600. */
    ttlSeconds: z.number().int().positive().optional(),
    /** Updates kept per session, oldest evicted first. Default: 200. */
    maxUpdates: z.number().int().positive().optional(),
    /** Durable snapshot path. Default: ~/.waypoint/session-state.json */
    stateFile: z.string().min(1).optional(),
  })
  .strict();

export type SessionsConfig = z.infer<typeof SessionsSchema>;

// ── Persistence ─────────────────────────────────────────────────────

export const WriteFailurePolicySchema = z.enum(["degrade", "fatal"]);

export type WriteFailurePolicy = z.infer<typeof WriteFailurePolicySchema>;

export const PersistenceSchema = z
  .object({
    /**
     * What a failed snapshot write does: keep serving from memory
     * ("degrade") or fail the request ("fatal"). Default: "degrade".
     */
    onWriteFailure: WriteFailurePolicySchema.optional(),
  })
  .strict();

export type PersistenceConfig = z.infer<typeof PersistenceSchema>;

// ── Gateway ─────────────────────────────────────────────────────────

export const GatewaySchema = z
  .object({
    /** HTTP listen port. Default: 5000. */
    port: z.number().int().positive().optional(),
    /** Bind address. Default: "0.0.0.0". */
    host: z.string().min(1).optional(),
    /** Origin used for share/monitor links instead of the request's. */
    publicBaseUrl: z.string().url().optional(),
  })
  .strict();

export type GatewayConfig = z.infer<typeof GatewaySchema>;

// ── Logging ─────────────────────────────────────────────────────────

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LoggingSchema = z
  .object({
    /** Log level. Default: "info". */
    level: LogLevelSchema.optional(),
    /** Human-readable output via pino-pretty. Default: false. */
    pretty: z.boolean().optional(),
    /** Redact session tokens in logs. Default: true. */
    redactSensitive: z.boolean().optional(),
  })
  .strict();

export type LoggingConfig = z.infer<typeof LoggingSchema>;

// ── Root config ─────────────────────────────────────────────────────

export const WaypointConfigSchema = z
  .object({
    sessions: SessionsSchema.optional(),
    persistence: PersistenceSchema.optional(),
    gateway: GatewaySchema.optional(),
    logging: LoggingSchema.optional(),
  })
  .strict();

export type WaypointConfig = z.infer<typeof WaypointConfigSchema>;
