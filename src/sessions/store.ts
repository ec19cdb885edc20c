/**
 * Session store — token-addressed telemetry sessions with a TTL.
 *
 * Owns the token → session map and mirrors it to a single JSON file after
 * every mutation (see `persistence.ts`). Expiry is lazy: a session past its
 * `expiresAt` is removed by the first access that notices, and there is no
 * background sweeper.
 *
 * Exclusion: every method is synchronous, file I/O included, so each call
 * runs to completion on the event loop. Lookup, expiry check, mutation and
 * the snapshot written to disk therefore form one critical section over
 * the whole store, and appends on a token are observed in arrival order.
 */

import type { WriteFailurePolicy } from "../config/schema.js";
import { DEFAULT_MAX_UPDATES, DEFAULT_TTL_SECONDS } from "../config/defaults.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import {
  PersistenceWriteError,
  SessionExpiredError,
  SessionNotFoundError,
} from "./errors.js";
import { parseUpdatePayload } from "./payload.js";
import { loadSessionState, saveSessionState } from "./persistence.js";
import { generateToken } from "./token.js";
import type {
  CreatedSession,
  SessionRecord,
  SessionSnapshot,
  SessionStatus,
  TelemetryUpdate,
} from "./types.js";
import { UpdateBuffer } from "./update-buffer.js";

/** Token collisions tolerated before `create()` gives up. */
const MAX_TOKEN_ATTEMPTS = 16;

// ── Options ─────────────────────────────────────────────────────────

export interface SessionStoreOptions {
  /** Durable snapshot path. */
  stateFile: string;
  /** Session lifetime from creation. Default: 3600. */
  ttlSeconds?: number;
  /** Updates kept per session. Default: 200. */
  maxUpdates?: number;
  /** Behaviour when a snapshot write fails. Default: "degrade". */
  onWriteFailure?: WriteFailurePolicy;
  logger?: Logger;
  /** Wall clock. Injected by tests. */
  clock?: () => Date;
  /** Token source. Injected by tests. */
  tokenFactory?: () => string;
}

// ── Helpers ─────────────────────────────────────────────────────────

function copyUpdate(update: TelemetryUpdate): TelemetryUpdate {
  const copy: TelemetryUpdate = { ts: new Date(update.ts), meta: { ...update.meta } };
  if (update.location) copy.location = { ...update.location };
  if (update.frame) copy.frame = update.frame;
  return copy;
}

function toSnapshot(session: SessionRecord): SessionSnapshot {
  return {
    token: session.token,
    createdAt: new Date(session.createdAt),
    expiresAt: new Date(session.expiresAt),
    lastSeen: session.lastSeen ? new Date(session.lastSeen) : null,
    updates: session.updates.snapshot().map(copyUpdate),
  };
}

// ── Store ───────────────────────────────────────────────────────────

export class SessionStore {
  readonly stateFile: string;
  readonly ttlSeconds: number;
  readonly maxUpdates: number;
  readonly onWriteFailure: WriteFailurePolicy;

  private readonly sessions: Map<string, SessionRecord>;
  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly tokenFactory: () => string;
  private writeFailed = false;

  /** Loads the durable snapshot once; bad content never throws here. */
  constructor(options: SessionStoreOptions) {
    this.stateFile = options.stateFile;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    this.maxUpdates = options.maxUpdates ?? DEFAULT_MAX_UPDATES;
    this.onWriteFailure = options.onWriteFailure ?? "degrade";
    this.log = (options.logger ?? silentLogger()).child({ component: "session-store" });
    this.clock = options.clock ?? (() => new Date());
    this.tokenFactory = options.tokenFactory ?? (() => generateToken());

    if (!Number.isInteger(this.ttlSeconds) || this.ttlSeconds <= 0) {
      throw new RangeError(`ttlSeconds must be a positive integer, got ${this.ttlSeconds}`);
    }

    this.sessions = loadSessionState(this.stateFile, {
      capacity: this.maxUpdates,
      logger: this.log,
    });
  }

  /** Sessions held, including expired ones no access has discovered yet. */
  get size(): number {
    return this.sessions.size;
  }

  /** `true` while the most recent snapshot write failed under "degrade". */
  get degraded(): boolean {
    return this.writeFailed;
  }

  // ── Operations ──────────────────────────────────────────────────

  create(): CreatedSession {
    const token = this.mintToken();
    const createdAt = this.clock();
    const expiresAt = new Date(createdAt.getTime() + this.ttlSeconds * 1000);

    this.sessions.set(token, {
      token,
      createdAt,
      expiresAt,
      lastSeen: null,
      updates: new UpdateBuffer<TelemetryUpdate>(this.maxUpdates),
    });
    this.log.info({ token, expiresAt: expiresAt.toISOString() }, "session created");
    this.persist();

    return {
      token,
      createdAt: new Date(createdAt),
      expiresAt: new Date(expiresAt),
      ttlSeconds: this.ttlSeconds,
    };
  }

  /**
   * Return a copy of a live session.
   *
   * @throws {SessionNotFoundError} Unknown token.
   * @throws {SessionExpiredError} TTL elapsed; the session is removed.
   */
  ensureLive(token: string): SessionSnapshot {
    return toSnapshot(this.requireLive(token));
  }

  get(token: string): SessionSnapshot {
    return this.ensureLive(token);
  }

  /**
   * Validate and record one telemetry update. Nothing changes when
   * validation fails.
   *
   * @throws {SessionNotFoundError | SessionExpiredError | InvalidPayloadError}
   */
  append(token: string, body: unknown): TelemetryUpdate {
    const session = this.requireLive(token);
    const now = this.clock();
    const update = parseUpdatePayload(body, now, token);

    session.updates.append(update);
    session.lastSeen = now;
    this.log.debug({ token, count: session.updates.length }, "update appended");
    this.persist();

    return copyUpdate(update);
  }

  /**
   * Remove a session whether or not it has expired.
   *
   * @throws {SessionNotFoundError} Unknown token.
   */
  close(token: string): void {
    if (!this.sessions.delete(token)) {
      throw new SessionNotFoundError(token);
    }
    this.log.info({ token }, "session closed");
    this.persist();
  }

  status(token: string): SessionStatus {
    const session = this.requireLive(token);
    const latest = session.updates.latest();
    return {
      token: session.token,
      createdAt: new Date(session.createdAt),
      expiresAt: new Date(session.expiresAt),
      lastSeen: session.lastSeen ? new Date(session.lastSeen) : null,
      historyCount: session.updates.length,
      latest: latest ? copyUpdate(latest) : null,
      ttlSeconds: this.ttlSeconds,
    };
  }

  // ── Internals ───────────────────────────────────────────────────

  private mintToken(): string {
    for (let attempt = 1; attempt <= MAX_TOKEN_ATTEMPTS; attempt++) {
      const token = this.tokenFactory();
      if (!this.sessions.has(token)) return token;
      this.log.warn({ attempt }, "generated token already in use, retrying");
    }
    throw new Error(`Could not mint a unique session token after ${MAX_TOKEN_ATTEMPTS} attempts`);
  }

  private requireLive(token: string): SessionRecord {
    const session = this.sessions.get(token);
    if (!session) throw new SessionNotFoundError(token);

    // Strictly later: a session is still live at exactly `expiresAt`.
    if (this.clock().getTime() > session.expiresAt.getTime()) {
      this.sessions.delete(token);
      this.log.info({ token }, "session expired");
      this.persist();
      throw new SessionExpiredError(token, new Date(session.expiresAt));
    }
    return session;
  }

  private persist(): void {
    try {
      saveSessionState(this.stateFile, this.sessions, this.log);
    } catch (err) {
      if (!(err instanceof PersistenceWriteError) || this.onWriteFailure === "fatal") {
        throw err;
      }
      this.log.error({ err }, "session state write failed, serving from memory");
      this.writeFailed = true;
      return;
    }

    if (this.writeFailed) {
      this.log.info("session state write recovered");
      this.writeFailed = false;
    }
  }
}
