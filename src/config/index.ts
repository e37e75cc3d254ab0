/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { ConfigError, optionalEnv, optionalEnvInt } from "./env.js";

export { ConfigError } from "./env.js";

export * from "./standards/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Default standards configuration file, if any */
  readonly standardsConfigPath: string | null;
  /** Directory for log files */
  readonly logDir: string;
  /** Documents processed at once in batch mode */
  readonly concurrency: number;
}

function loadConfig(): AppConfig {
  const standardsConfigPath = optionalEnv("STANDARDS_CONFIG", "");
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    standardsConfigPath: standardsConfigPath === "" ? null : standardsConfigPath,
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    concurrency: optionalEnvInt("NORMALIZE_CONCURRENCY", 4),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate environment-derived configuration.
 * Call this at startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`
    );
  }
}
