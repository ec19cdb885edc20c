/**
 * Durable mirror of the session store — a single JSON file keyed by token.
 *
 * Shape:
 *   {
 *     "<token>": {
 *       "token": "<token>",
 *       "created_at": "2026-01-01T10:00:00.000Z",
 *       "expires_at": "2026-01-01T11:00:00.000Z",
 *       "last_seen": null,
 *       "updates": [{ "ts": "...", "location": {...}, "frame": "data:image/...", "meta": {...} }]
 *     }
 *   }
 *
 * Saves go through a sibling `.tmp` file that is fsynced and renamed over
 * the durable path, so readers only ever see a complete snapshot. Loads
 * recover what they can: a corrupt file is backed up and yields no
 * sessions, a corrupt record is skipped on its own.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

import { ensureDir } from "../config/paths.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { PersistenceWriteError } from "./errors.js";
import type { GeoLocation, SessionRecord, TelemetryUpdate, UpdateMeta } from "./types.js";
import { UpdateBuffer } from "./update-buffer.js";

// ── Serialized shapes ───────────────────────────────────────────────

export interface SerializedUpdate {
  ts: string;
  location?: GeoLocation;
  frame?: string;
  meta: UpdateMeta;
}

export interface SerializedSession {
  token: string;
  created_at: string;
  expires_at: string;
  last_seen: string | null;
  updates: SerializedUpdate[];
}

export type SerializedState = Record<string, SerializedSession>;

// ── Record schema ───────────────────────────────────────────────────

const Timestamp = z
  .string()
  .datetime({ offset: true })
  .transform((s) => new Date(s));

const Reading = z
  .number()
  .nullish()
  .transform((v) => v ?? null);

const PersistedUpdateSchema = z
  .object({
    ts: Timestamp,
    location: z
      .object({ lat: Reading, lng: Reading, accuracy: Reading, speed: Reading })
      .nullish(),
    frame: z.string().nullish(),
    meta: z
      .object({
        ua: z.string().nullish(),
        tzOffsetMinutes: z.number().int().nullish(),
      })
      .nullish(),
  })
  .refine((u) => Boolean(u.location) || Boolean(u.frame), {
    message: "update carries neither location nor frame",
  });

const PersistedSessionSchema = z
  .object({
    created_at: Timestamp,
    expires_at: Timestamp,
    last_seen: z
      .literal("")
      .transform(() => null)
      .or(Timestamp)
      .nullish(),
    updates: z.array(PersistedUpdateSchema).default([]),
  })
  .refine((s) => s.expires_at.getTime() > s.created_at.getTime(), {
    message: "expires_at must be after created_at",
  });

type PersistedUpdate = z.infer<typeof PersistedUpdateSchema>;

// ── Serialize ───────────────────────────────────────────────────────

export function serializeUpdate(update: TelemetryUpdate): SerializedUpdate {
  const out: SerializedUpdate = { ts: update.ts.toISOString(), meta: { ...update.meta } };
  if (update.location) out.location = { ...update.location };
  if (update.frame) out.frame = update.frame;
  return out;
}

export function serializeSessions(sessions: ReadonlyMap<string, SessionRecord>): SerializedState {
  const state: SerializedState = {};
  for (const [token, session] of sessions) {
    state[token] = {
      token,
      created_at: session.createdAt.toISOString(),
      expires_at: session.expiresAt.toISOString(),
      last_seen: session.lastSeen ? session.lastSeen.toISOString() : null,
      updates: session.updates.snapshot().map(serializeUpdate),
    };
  }
  return state;
}

function toTelemetryUpdate(u: PersistedUpdate): TelemetryUpdate {
  const update: TelemetryUpdate = {
    ts: u.ts,
    meta: { ua: u.meta?.ua ?? null, tzOffsetMinutes: u.meta?.tzOffsetMinutes ?? null },
  };
  if (u.location) update.location = u.location;
  if (u.frame) update.frame = u.frame;
  return update;
}

// ── Write ───────────────────────────────────────────────────────────

export function resolveTempPath(filePath: string): string {
  return `${filePath}.tmp`;
}

/**
 * Atomically replace the durable file with a snapshot of `sessions`.
 *
 * @throws {PersistenceWriteError} If any step fails. The previous durable
 *   file is left untouched and the temp file is removed where possible.
 */
export function saveSessionState(
  filePath: string,
  sessions: ReadonlyMap<string, SessionRecord>,
  logger?: Logger,
): void {
  const tmpPath = resolveTempPath(filePath);
  try {
    ensureDir(path.dirname(filePath));
    const json = JSON.stringify(serializeSessions(sessions), null, 2) + "\n";

    const fd = fs.openSync(tmpPath, "w");
    try {
      fs.writeFileSync(fd, json, "utf-8");
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    removeTempFile(tmpPath, logger ?? silentLogger());
    throw new PersistenceWriteError(filePath, err);
  }
}

function removeTempFile(tmpPath: string, log: Logger): void {
  try {
    fs.rmSync(tmpPath, { force: true });
  } catch (err) {
    log.warn({ err, tmpPath }, "could not remove temp session state");
  }
}

// ── Read ────────────────────────────────────────────────────────────

export interface LoadSessionStateOptions {
  /** Per-session update capacity; longer persisted histories keep the newest. */
  capacity: number;
  logger?: Logger;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function backupCorruptFile(filePath: string, log: Logger): void {
  const backupPath = `${filePath}.bak.${Date.now()}`;
  try {
    fs.copyFileSync(filePath, backupPath);
    log.warn({ backupPath }, "corrupt session state backed up");
  } catch (err) {
    log.warn({ err, filePath }, "could not back up corrupt session state");
  }
}

/**
 * Load every recoverable session from the durable file.
 *
 * Never throws on bad content: a missing file, an unreadable or
 * unparsable one, and individually invalid records all degrade to fewer
 * (or no) recovered sessions.
 */
export function loadSessionState(
  filePath: string,
  options: LoadSessionStateOptions,
): Map<string, SessionRecord> {
  const log = options.logger ?? silentLogger();
  const sessions = new Map<string, SessionRecord>();

  if (!fs.existsSync(filePath)) return sessions;

  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    log.warn({ err, filePath }, "session state unreadable, starting empty");
    return sessions;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    log.warn({ err, filePath }, "session state is not valid JSON, starting empty");
    backupCorruptFile(filePath, log);
    return sessions;
  }

  if (!isPlainObject(parsed)) {
    log.warn({ filePath }, "session state is not an object, starting empty");
    backupCorruptFile(filePath, log);
    return sessions;
  }

  for (const [token, value] of Object.entries(parsed)) {
    const result = PersistedSessionSchema.safeParse(value);
    if (!result.success) {
      log.warn(
        { token, issues: result.error.issues.map((i) => i.message) },
        "skipping unrecoverable session record",
      );
      continue;
    }

    const record = result.data;
    sessions.set(token, {
      token,
      createdAt: record.created_at,
      expiresAt: record.expires_at,
      lastSeen: record.last_seen ?? null,
      updates: new UpdateBuffer(options.capacity, record.updates.map(toTelemetryUpdate)),
    });
  }

  log.info({ filePath, recovered: sessions.size }, "session state loaded");
  return sessions;
}
