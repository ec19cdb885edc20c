import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  loadConfig,
  ConfigFileNotFoundError,
  ConfigParseError,
  ConfigValidationError,
  MissingEnvVarError,
} from "./loader.js";
import { DEFAULT_GATEWAY_PORT } from "./paths.js";
import { DEFAULT_LOG_LEVEL, DEFAULT_MAX_UPDATES, DEFAULT_TTL_SECONDS } from "./defaults.js";

// ── Test helpers ────────────────────────────────────────────────────

let tmpDir: string;
let env: NodeJS.ProcessEnv;

function writeTmpConfig(content: string, filename = "waypoint.json"): string {
  const filePath = path.join(tmpDir, filename);
  fs.writeFileSync(filePath, content, "utf-8");
  return filePath;
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "waypoint-config-test-"));
  env = { WAYPOINT_STATE_DIR: tmpDir };
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ── Tests ───────────────────────────────────────────────────────────

describe("loadConfig", () => {
  it("loads and validates a JSON5 config", () => {
    const configPath = writeTmpConfig(`{
      // JSON5 comments are allowed
      sessions: { ttlSeconds: 600, maxUpdates: 20, },
      gateway: { port: 8080 },
    }`);

    const { config, path: loaded } = loadConfig({ configPath, env });
    expect(loaded).toBe(configPath);
    expect(config.sessions.ttlSeconds).toBe(600);
    expect(config.sessions.maxUpdates).toBe(20);
    expect(config.gateway.port).toBe(8080);
  });

  it("applies defaults after validation", () => {
    const configPath = writeTmpConfig(`{}`);

    const { config } = loadConfig({ configPath, env });
    expect(config.sessions.ttlSeconds).toBe(DEFAULT_TTL_SECONDS);
    expect(config.sessions.maxUpdates).toBe(DEFAULT_MAX_UPDATES);
    expect(config.sessions.stateFile).toBe(path.join(tmpDir, "session-state.json"));
    expect(config.persistence.onWriteFailure).toBe("degrade");
    expect(config.gateway.port).toBe(DEFAULT_GATEWAY_PORT);
    expect(config.logging.level).toBe(DEFAULT_LOG_LEVEL);
    expect(config.logging.redactSensitive).toBe(true);
  });

  it("finds the config in the state dir by default", () => {
    writeTmpConfig(`{ logging: { level: "warn" } }`);
    const { config, path: loaded } = loadConfig({ env });
    expect(loaded).toBe(path.join(tmpDir, "waypoint.json"));
    expect(config.logging.level).toBe("warn");
  });

  it("substitutes ${VAR} from env", () => {
    const configPath = writeTmpConfig(`{
      sessions: { stateFile: "\${DATA_DIR}/state.json" },
    }`);

    const { config } = loadConfig({
      configPath,
      env: { ...env, DATA_DIR: "/var/lib/waypoint" },
    });
    expect(config.sessions.stateFile).toBe("/var/lib/waypoint/state.json");
  });

  it("throws MissingEnvVarError for unset env vars", () => {
    const configPath = writeTmpConfig(`{ sessions: { stateFile: "\${UNSET_DIR}/s.json" } }`);
    expect(() => loadConfig({ configPath, env })).toThrow(MissingEnvVarError);
  });

  it("throws ConfigFileNotFoundError for missing file", () => {
    expect(() =>
      loadConfig({ configPath: path.join(tmpDir, "nope.json"), env }),
    ).toThrow(ConfigFileNotFoundError);
  });

  it("falls back to defaults for a missing file with allowMissing", () => {
    const { config, path: loaded } = loadConfig({
      configPath: path.join(tmpDir, "nope.json"),
      env,
      allowMissing: true,
    });
    expect(loaded).toBeNull();
    expect(config.sessions.ttlSeconds).toBe(DEFAULT_TTL_SECONDS);
  });

  it("throws ConfigParseError for invalid JSON5", () => {
    const configPath = writeTmpConfig("{{{ not json");
    expect(() => loadConfig({ configPath, env })).toThrow(ConfigParseError);
  });

  it("throws ConfigValidationError for invalid schema", () => {
    const configPath = writeTmpConfig(`{ sessions: { ttlSeconds: -5 } }`);
    expect(() => loadConfig({ configPath, env })).toThrow(ConfigValidationError);
  });

  it("throws ConfigValidationError for unknown keys (strict)", () => {
    const configPath = writeTmpConfig(`{ gateway: { port: 80, tls: true } }`);
    expect(() => loadConfig({ configPath, env })).toThrow(/gateway/);
  });

  it("honours WAYPOINT_PORT over the file", () => {
    const configPath = writeTmpConfig(`{ gateway: { port: 8080 } }`);
    const { config } = loadConfig({ configPath, env: { ...env, WAYPOINT_PORT: "9090" } });
    expect(config.gateway.port).toBe(9090);
  });
});
