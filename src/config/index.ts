/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  ConfigError,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
} from "./env.js";

export { ConfigError, requireEnv } from "./env.js";

// Re-export pipeline configuration module
export * from "./pipeline/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  readonly debug: boolean;
  readonly logLevel: string;
  readonly appName: string;
  /** Directory receiving cleaned data, report, charts and model */
  readonly outputDir: string;
  readonly logDir: string;
  /** Attempts per stage before a transient failure is surfaced */
  readonly retryMaxAttempts: number;
  /** Linear backoff unit between attempts, in milliseconds */
  readonly retryBackoffMs: number;
  readonly activityLogLimit: number;
}

function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "eda-pipeline"),
    outputDir: optionalEnv("OUTPUT_DIR", "output"),
    logDir: optionalEnv("LOG_DIR", "output/logs"),
    retryMaxAttempts: optionalEnvInt("RETRY_MAX_ATTEMPTS", 3, 1),
    retryBackoffMs: optionalEnvInt("RETRY_BACKOFF_MS", 30_000),
    activityLogLimit: optionalEnvInt("ACTIVITY_LOG_LIMIT", 20, 1),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values that have no usable default.
 * Call this at application startup to fail fast.
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
