/**
 * Environment variable access.
 * Loads .env once on import; values already in the environment win.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Unset and empty variables are treated alike. */
function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * Read a positive integer, e.g. a worker count.
 */
export function optionalEnvInt(key: string, defaultValue: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`Environment variable ${key} must be a positive integer, got: ${value}`);
  }
  return parsed;
}
