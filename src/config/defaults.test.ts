import { describe, it, expect } from "vitest";
import path from "node:path";
import {
  applyAllDefaults,
  applyGatewayDefaults,
  applyLoggingDefaults,
  applyPersistenceDefaults,
  applySessionDefaults,
  DEFAULT_GATEWAY_HOST,
  DEFAULT_LOG_LEVEL,
  DEFAULT_MAX_UPDATES,
  DEFAULT_TTL_SECONDS,
} from "./defaults.js";
import { DEFAULT_GATEWAY_PORT } from "./paths.js";

const env: NodeJS.ProcessEnv = { WAYPOINT_STATE_DIR: "/srv/waypoint" };

describe("applySessionDefaults", () => {
  it("fills every field when the section is missing", () => {
    expect(applySessionDefaults(undefined, env)).toEqual({
      ttlSeconds: DEFAULT_TTL_SECONDS,
      maxUpdates: DEFAULT_MAX_UPDATES,
      stateFile: path.join(path.resolve("/srv/waypoint"), "session-state.json"),
    });
  });

  it("preserves explicitly set values", () => {
    const result = applySessionDefaults(
      { ttlSeconds: 60, maxUpdates: 5, stateFile: "/data/s.json" },
      env,
    );
    expect(result).toEqual({ ttlSeconds: 60, maxUpdates: 5, stateFile: "/data/s.json" });
  });

  it("uses the documented constants", () => {
    expect(DEFAULT_TTL_SECONDS).toBe(3600);
    expect(DEFAULT_MAX_UPDATES).toBe(200);
  });
});

describe("applyPersistenceDefaults", () => {
  it("degrades by default", () => {
    expect(applyPersistenceDefaults()).toEqual({ onWriteFailure: "degrade" });
  });

  it("keeps the fatal policy", () => {
    expect(applyPersistenceDefaults({ onWriteFailure: "fatal" })).toEqual({
      onWriteFailure: "fatal",
    });
  });
});

describe("applyGatewayDefaults", () => {
  it("adds default port and host when gateway is undefined", () => {
    const result = applyGatewayDefaults(undefined, {});
    expect(result.port).toBe(DEFAULT_GATEWAY_PORT);
    expect(result.host).toBe(DEFAULT_GATEWAY_HOST);
    expect(result.publicBaseUrl).toBeUndefined();
  });

  it("preserves an existing port", () => {
    expect(applyGatewayDefaults({ port: 9000 }, {}).port).toBe(9000);
  });

  it("lets WAYPOINT_PORT override the configured port", () => {
    expect(applyGatewayDefaults({ port: 9000 }, { WAYPOINT_PORT: "7000" }).port).toBe(7000);
  });

  it("strips trailing slashes from publicBaseUrl", () => {
    const result = applyGatewayDefaults({ publicBaseUrl: "https://track.example.com/" }, {});
    expect(result.publicBaseUrl).toBe("https://track.example.com");
  });
});

describe("applyLoggingDefaults", () => {
  it("adds logging defaults when logging is undefined", () => {
    expect(applyLoggingDefaults()).toEqual({
      level: DEFAULT_LOG_LEVEL,
      pretty: false,
      redactSensitive: true,
    });
  });

  it("preserves explicitly set values", () => {
    expect(applyLoggingDefaults({ level: "debug", redactSensitive: false })).toEqual({
      level: "debug",
      pretty: false,
      redactSensitive: false,
    });
  });
});

describe("applyAllDefaults", () => {
  it("resolves every section of an empty config", () => {
    const result = applyAllDefaults({}, env);
    expect(result.sessions.ttlSeconds).toBe(DEFAULT_TTL_SECONDS);
    expect(result.persistence.onWriteFailure).toBe("degrade");
    expect(result.gateway.port).toBe(DEFAULT_GATEWAY_PORT);
    expect(result.logging.level).toBe(DEFAULT_LOG_LEVEL);
  });

  it("does not mutate the input", () => {
    const cfg = { sessions: { ttlSeconds: 120 } };
    applyAllDefaults(cfg, env);
    expect(cfg).toEqual({ sessions: { ttlSeconds: 120 } });
  });
});
