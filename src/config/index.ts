/**
 * Process configuration.
 * Validates and exposes typed configuration values from the environment.
 */

import { ConfigError, optionalEnv, optionalEnvBool, optionalEnvInt, optionalEnvOrNull } from "./env.js";

export { ConfigError } from "./env.js";

// Re-export engine configuration module
export * from "./engine/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Debug mode; makes "debug" the default log level */
  readonly debug: boolean;
  /** Log level; LOG_LEVEL wins over DEBUG */
  readonly logLevel: string;
  /** Also append log entries to output/logs */
  readonly logToFile: boolean;
  /** Application name */
  readonly appName: string;
  /** Path to the engine configuration JSON */
  readonly engineConfigPath: string;
  /** Root folder of the file-backed artifact store */
  readonly dataRoot: string;
  /** "YYMMDD" date pinning today(), or null for the wall clock */
  readonly forcedToday: string | null;
  /** Overrides the configured step concurrency when above zero */
  readonly maxConcurrency: number;
}

/**
 * Load configuration from the environment.
 */
export function loadConfig(): AppConfig {
  const debug = optionalEnvBool("DEBUG", false);
  return {
    env: optionalEnv("NODE_ENV", "development"),
    debug,
    logLevel: optionalEnv("LOG_LEVEL", debug ? "debug" : "info"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    appName: optionalEnv("APP_NAME", "temporal-hub-engine"),
    engineConfigPath: optionalEnv("ENGINE_CONFIG", "config/engine.json"),
    dataRoot: optionalEnv("DATA_ROOT", "data"),
    forcedToday: optionalEnvOrNull("FORCED_TODAY"),
    maxConcurrency: optionalEnvInt("MAX_CONCURRENCY", 0),
  };
}

/**
 * Validate configuration values.
 * Call this at application startup to fail fast.
 */
export function validateConfig(config: AppConfig): void {
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

  if (config.maxConcurrency < 0) {
    throw new ConfigError(
      `Invalid MAX_CONCURRENCY: ${config.maxConcurrency}. Must be zero or positive.`
    );
  }

  if (config.forcedToday !== null && !/^\d{6}$/.test(config.forcedToday)) {
    throw new ConfigError(
      `Invalid FORCED_TODAY: ${config.forcedToday}. Must be a YYMMDD date.`
    );
  }
}
