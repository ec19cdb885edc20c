import { describe, it, expect } from "vitest";
import { resolveConfigEnvVars, MissingEnvVarError } from "./env-substitution.js";

describe("resolveConfigEnvVars", () => {
  const env: NodeJS.ProcessEnv = {
    DATA_DIR: "/var/lib/waypoint",
    PUBLIC_HOST: "track.example.com",
    EMPTY: "",
  };

  it("substitutes ${VAR} in strings", () => {
    expect(resolveConfigEnvVars({ dir: "${DATA_DIR}" }, env)).toEqual({
      dir: "/var/lib/waypoint",
    });
  });

  it("substitutes multiple vars in one string", () => {
    expect(resolveConfigEnvVars("https://${PUBLIC_HOST}${DATA_DIR}", env)).toBe(
      "https://track.example.com/var/lib/waypoint",
    );
  });

  it("handles nested objects and arrays", () => {
    const input = {
      sessions: { stateFile: "${DATA_DIR}/state.json" },
      list: ["${PUBLIC_HOST}", 3],
    };
    expect(resolveConfigEnvVars(input, env)).toEqual({
      sessions: { stateFile: "/var/lib/waypoint/state.json" },
      list: ["track.example.com", 3],
    });
  });

  it("passes non-string primitives through", () => {
    expect(resolveConfigEnvVars({ n: 1, b: true, z: null }, env)).toEqual({
      n: 1,
      b: true,
      z: null,
    });
  });

  it("turns $${VAR} into a literal ${VAR}", () => {
    expect(resolveConfigEnvVars("keep $${DATA_DIR}", env)).toBe("keep ${DATA_DIR}");
  });

  it("leaves lowercase references alone", () => {
    expect(resolveConfigEnvVars("${data_dir}", env)).toBe("${data_dir}");
  });

  it("throws MissingEnvVarError with the config path", () => {
    const input = { sessions: { stateFile: "${NOPE}" } };
    expect(() => resolveConfigEnvVars(input, env)).toThrow(MissingEnvVarError);
    try {
      resolveConfigEnvVars(input, env);
    } catch (err) {
      expect(err).toBeInstanceOf(MissingEnvVarError);
      if (err instanceof MissingEnvVarError) {
        expect(err.varName).toBe("NOPE");
        expect(err.configPath).toBe("sessions.stateFile");
      }
    }
  });

  it("treats an empty variable as missing", () => {
    expect(() => resolveConfigEnvVars({ x: "${EMPTY}" }, env)).toThrow(
      'Missing env var "EMPTY" referenced at config path: x',
    );
  });

  it("reports array indices in the config path", () => {
    expect(() => resolveConfigEnvVars({ list: ["ok", "${NOPE}"] }, env)).toThrow(
      "config path: list[1]",
    );
  });
});
