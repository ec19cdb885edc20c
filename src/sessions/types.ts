import type { UpdateBuffer } from "./update-buffer.js";

// ── Telemetry ───────────────────────────────────────────────────────

/** One geolocation sample. Each field is a finite number or `null`. */
export interface GeoLocation {
  lat: number | null;
  lng: number | null;
  accuracy: number | null;
  speed: number | null;
}

export interface UpdateMeta {
  /** Client user-agent string. */
  ua: string | null;
  /** Client timezone offset, as reported by `Date#getTimezoneOffset()`. */
  tzOffsetMinutes: number | null;
}

/**
 * One accepted telemetry sample. Carries at least one of `location`
 * and `frame`.
 */
export interface TelemetryUpdate {
  /** Server-assigned ingestion instant. */
  ts: Date;
  location?: GeoLocation;
  /** `data:image/...` URI. */
  frame?: string;
  meta: UpdateMeta;
}

// ── Sessions ────────────────────────────────────────────────────────

/** Store-owned session state. Never handed out directly. */
export interface SessionRecord {
  token: string;
  createdAt: Date;
  expiresAt: Date;
  lastSeen: Date | null;
  updates: UpdateBuffer<TelemetryUpdate>;
}

/** Detached copy of a session, safe to hold across store calls. */
export interface SessionSnapshot {
  token: string;
  createdAt: Date;
  expiresAt: Date;
  lastSeen: Date | null;
  updates: TelemetryUpdate[];
}

export interface CreatedSession {
  token: string;
  createdAt: Date;
  expiresAt: Date;
  ttlSeconds: number;
}

export interface SessionStatus {
  token: string;
  createdAt: Date;
  expiresAt: Date;
  lastSeen: Date | null;
  historyCount: number;
  latest: TelemetryUpdate | null;
  ttlSeconds: number;
}
