/**
 * Sessions layer — public API.
 *
 * @example
 * ```ts
 * import { SessionStore } from "./sessions/index.js";
 *
 * const store = new SessionStore({ stateFile: "/var/lib/waypoint/session-state.json" });
 * const { token } = store.create();
 *
 * store.append(token, { location: { lat: 52.37, lng: 4.89 } });
 * store.status(token).historyCount; // 1
 * store.close(token);
 * ```
 */

export { SessionStore, type SessionStoreOptions } from "./store.js";

export { UpdateBuffer } from "./update-buffer.js";

export { generateToken, TOKEN_BYTES } from "./token.js";

export {
  parseUpdatePayload,
  UpdateBodySchema,
  FRAME_PREFIX,
  NO_TELEMETRY_MESSAGE,
  type UpdateBody,
} from "./payload.js";

export {
  loadSessionState,
  saveSessionState,
  serializeSessions,
  serializeUpdate,
  resolveTempPath,
  type LoadSessionStateOptions,
  type SerializedSession,
  type SerializedState,
  type SerializedUpdate,
} from "./persistence.js";

export {
  SessionError,
  SessionNotFoundError,
  SessionExpiredError,
  InvalidPayloadError,
  PersistenceWriteError,
  isSessionError,
  type SessionErrorReason,
} from "./errors.js";

export type {
  GeoLocation,
  UpdateMeta,
  TelemetryUpdate,
  SessionRecord,
  SessionSnapshot,
  CreatedSession,
  SessionStatus,
} from "./types.js";
