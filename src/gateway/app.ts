/**
 * HTTP gateway — maps the session store onto a small JSON API.
 *
 *   POST   /api/session          create, returns share + monitor links
 *   DELETE /api/session/:token   close
 *   POST   /api/update/:token    ingest one telemetry update
 *   GET    /api/status/:token    latest state for the monitor (polled)
 *   GET    /health
 *
 * The store handle is passed in; the gateway holds no session state.
 */

import { Hono, type Context } from "hono";

import { silentLogger, type Logger } from "../logging/logger.js";
import {
  InvalidPayloadError,
  PersistenceWriteError,
  isSessionError,
} from "../sessions/errors.js";
import { serializeUpdate } from "../sessions/persistence.js";
import type { SessionStore } from "../sessions/store.js";

export interface GatewayOptions {
  store: SessionStore;
  logger?: Logger;
  /** Origin for generated links. Defaults to the request's own origin. */
  publicBaseUrl?: string;
  /** Log request paths with the token segment masked. Default: true. */
  redactTokens?: boolean;
}

const STATUS_BY_REASON = {
  not_found: 404,
  expired: 410,
  invalid_payload: 400,
} as const;

const TOKEN_SEGMENT = /^(\/api\/(?:session|update|status)\/)[^/]+/;

export function maskTokenPath(requestPath: string): string {
  return requestPath.replace(TOKEN_SEGMENT, "$1:token");
}

function baseUrlFor(c: Context, configured?: string): string {
  return configured ?? new URL(c.req.url).origin;
}

export function createGatewayApp(options: GatewayOptions): Hono {
  const { store } = options;
  const redactTokens = options.redactTokens ?? true;
  const log = (options.logger ?? silentLogger()).child({ component: "gateway" });
  const app = new Hono();

  app.use("*", async (c, next) => {
    const started = Date.now();
    await next();
    log.debug(
      {
        method: c.req.method,
        path: redactTokens ? maskTokenPath(c.req.path) : c.req.path,
        status: c.res.status,
        durationMs: Date.now() - started,
      },
      "request handled",
    );
  });

  app.get("/health", (c) =>
    c.json({ status: "ok", sessions: store.size, degraded: store.degraded }),
  );

  app.post("/api/session", (c) => {
    const created = store.create();
    const base = baseUrlFor(c, options.publicBaseUrl);
    return c.json({
      token: created.token,
      link: `${base}/track/${created.token}`,
      monitor: `${base}/monitor/${created.token}`,
      expires_at: created.expiresAt.toISOString(),
      ttl_seconds: created.ttlSeconds,
    });
  });

  app.delete("/api/session/:token", (c) => {
    const token = c.req.param("token");
    store.close(token);
    return c.json({ status: "closed", token });
  });

  app.post("/api/update/:token", async (c) => {
    const token = c.req.param("token");
    // Bodies that are not JSON, or are JSON null, count as empty.
    const body: unknown = (await c.req.json<unknown>().catch(() => null)) ?? {};
    store.append(token, body);
    return c.json({ status: "ok" });
  });

  app.get("/api/status/:token", (c) => {
    const status = store.status(c.req.param("token"));
    return c.json({
      token: status.token,
      created: status.createdAt.toISOString(),
      expires_at: status.expiresAt.toISOString(),
      last_seen: status.lastSeen ? status.lastSeen.toISOString() : null,
      history_count: status.historyCount,
      latest: status.latest ? serializeUpdate(status.latest) : null,
      ttl_seconds: status.ttlSeconds,
    });
  });

  app.notFound((c) => c.json({ error: "Route not found" }, 404));

  app.onError((err, c) => {
    if (err instanceof InvalidPayloadError && err.issues.length > 0) {
      return c.json({ error: err.message, issues: err.issues }, 400);
    }
    if (isSessionError(err)) {
      return c.json({ error: err.message }, STATUS_BY_REASON[err.reason]);
    }
    if (err instanceof PersistenceWriteError) {
      log.error({ err }, "request failed on session state write");
      return c.json({ error: "Session state could not be saved" }, 500);
    }
    log.error({ err }, "unhandled gateway error");
    return c.json({ error: "Internal server error" }, 500);
  });

  return app;
}
