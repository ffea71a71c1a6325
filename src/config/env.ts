/**
 * Matches `${VAR}` and `${VAR:-default}`. `$${VAR}` escapes the expansion.
 */
const ENV_VAR_PATTERN = /(\$?)\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

export interface InterpolationOptions {
  env?: NodeJS.ProcessEnv;
  /** Receives the name of every referenced variable that is unset and has no default. */
  onMissing?: (name: string) => void;
}

/**
 * Expands environment variable references in one string.
 */
export function interpolateEnvVarsInString(
  value: string,
  options: InterpolationOptions = {}
): string {
  const env = options.env ?? process.env;
  return value.replace(
    ENV_VAR_PATTERN,
    (match, escape: string, name: string, fallback: string | undefined) => {
      if (escape) {
        return match.slice(1);
      }
      const resolved = env[name];
      if (resolved !== undefined) {
        return resolved;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      options.onMissing?.(name);
      return match;
    }
  );
}

/**
 * Expands environment variable references in every string of a parsed
 * document. Keys are left alone.
 */
export function interpolateEnvVars(
  value: unknown,
  options: InterpolationOptions = {}
): unknown {
  if (typeof value === "string") {
    return interpolateEnvVarsInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => interpolateEnvVars(item, options));
  }
  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = interpolateEnvVars(item, options);
    }
    return result;
  }
  return value;
}
