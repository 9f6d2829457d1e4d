/**
 * Environment variable readers.
 *
 * Importing this module loads .env from the working directory. Each reader
 * takes the variable map explicitly so configuration can be built from
 * something other than process.env.
 */

import "dotenv/config";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Unset and empty variables both take the default */
export function optionalEnv(env: EnvSource, key: string, defaultValue: string): string {
  const value = env[key]?.trim();
  return value ? value : defaultValue;
}

/**
 * Recognizes true/false, 1/0 and yes/no, case-insensitively.
 *
 * @throws ConfigError for any other value
 */
export function optionalEnvBool(env: EnvSource, key: string, defaultValue: boolean): boolean {
  const value = optionalEnv(env, key, "").toLowerCase();
  if (value === "") {
    return defaultValue;
  }
  if (value === "true" || value === "1" || value === "yes") {
    return true;
  }
  if (value === "false" || value === "0" || value === "no") {
    return false;
  }
  throw new ConfigError(`${key} must be true/false, 1/0 or yes/no, got: ${value}`);
}

/**
 * @throws ConfigError if the value is not one of `allowed`
 */
export function optionalEnvChoice<T extends string>(
  env: EnvSource,
  key: string,
  allowed: ReadonlyArray<T>,
  defaultValue: T
): T {
  const value = optionalEnv(env, key, defaultValue);
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ConfigError(`Invalid ${key}: ${value}. Must be one of ${allowed.join(", ")}.`);
  }
  return match;
}
