/**
 * Session store error taxonomy.
 *
 * `SessionError` subclasses are client errors keyed by `reason`, so the
 * gateway can map them without string matching. `PersistenceWriteError`
 * is an operator-side failure and deliberately not a `SessionError`.
 */

export type SessionErrorReason = "not_found" | "expired" | "invalid_payload";

export class SessionError extends Error {
  readonly reason: SessionErrorReason;
  readonly token?: string;

  constructor(
    reason: SessionErrorReason,
    message: string,
    opts?: { token?: string; cause?: unknown },
  ) {
    super(message, { cause: opts?.cause });
    this.name = "SessionError";
    this.reason = reason;
    this.token = opts?.token;
  }
}

/** Token never existed, was closed, or was already evicted on expiry. */
export class SessionNotFoundError extends SessionError {
  constructor(token: string) {
    super("not_found", "Unknown session token", { token });
    this.name = "SessionNotFoundError";
  }
}

/** Token existed but its TTL elapsed; the session has now been removed. */
export class SessionExpiredError extends SessionError {
  readonly expiredAt: Date;

  constructor(token: string, expiredAt: Date) {
    super("expired", "Session expired", { token });
    this.name = "SessionExpiredError";
    this.expiredAt = expiredAt;
  }
}

export class InvalidPayloadError extends SessionError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], token?: string) {
    super("invalid_payload", message, { token });
    this.name = "InvalidPayloadError";
    this.issues = issues;
  }
}

export class PersistenceWriteError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write session state to ${filePath}: ${detail}`, { cause });
    this.name = "PersistenceWriteError";
  }
}

export function isSessionError(err: unknown): err is SessionError {
  return err instanceof SessionError;
}
