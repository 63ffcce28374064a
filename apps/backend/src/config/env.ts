/**
 * Environment variable readers.
 * Every reader takes the source explicitly so configuration can be built from
 * a plain object in tests.
 */

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Get an optional variable; empty strings count as unset.
 */
export function optionalEnv(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * Get an optional variable as a number.
 * Throws ConfigError when the value is present but not numeric.
 */
export function optionalEnvNumber(env: EnvSource, key: string): number | undefined {
  const value = optionalEnv(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}
