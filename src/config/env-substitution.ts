/**
 * `${VAR}` substitution in config string values.
 *
 * - Only uppercase names match: `[A-Z_][A-Z0-9_]*`
 * - `$${VAR}` yields a literal `${VAR}`
 * - An unset or empty variable throws `MissingEnvVarError` naming the
 *   config path it was referenced from
 *
 * @example
 * ```json5
 * {
 *   sessions: { stateFile: "${DATA_DIR}/session-state.json" },
 * }
 * ```
 */

const REFERENCE_RE = /\$(\$?)\{([A-Z_][A-Z0-9_]*)\}/g;

// ── Error ───────────────────────────────────────────────────────────

export class MissingEnvVarError extends Error {
  constructor(
    public readonly varName: string,
    public readonly configPath: string,
  ) {
    super(`Missing env var "${varName}" referenced at config path: ${configPath}`);
    this.name = "MissingEnvVarError";
  }
}

// ── Walk ────────────────────────────────────────────────────────────

function substituteString(
  value: string,
  env: NodeJS.ProcessEnv,
  configPath: string,
): string {
  if (!value.includes("${")) return value;

  return value.replace(REFERENCE_RE, (_match, escape: string, name: string) => {
    if (escape) return `\${${name}}`;
    const envValue = env[name];
    if (envValue === undefined || envValue === "") {
      throw new MissingEnvVarError(name, configPath);
    }
    return envValue;
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function substituteAny(value: unknown, env: NodeJS.ProcessEnv, at: string): unknown {
  if (typeof value === "string") return substituteString(value, env, at);

  if (Array.isArray(value)) {
    return value.map((item, index) => substituteAny(item, env, `${at}[${index}]`));
  }

  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, child]) => [
        key,
        substituteAny(child, env, at ? `${at}.${key}` : key),
      ]),
    );
  }

  return value;
}

/**
 * Resolve `${VAR_NAME}` references anywhere in a parsed config tree.
 *
 * @throws {MissingEnvVarError} If a referenced env var is not set or empty
 */
export function resolveConfigEnvVars(
  obj: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  return substituteAny(obj, env, "");
}
