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

export { ConfigError, optionalEnv, optionalEnvInt, optionalEnvBool } from "./env.js";

// Render profile (JSON) configuration
export * from "./profile/index.js";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Log level */
  readonly logLevel: string;
  /** Shell used to run format pipes */
  readonly shell: string;
  /** Screen width assumed when the caller does not give one */
  readonly columns: number;
  /** Reserve three columns for an arrow cursor */
  readonly arrowCursor: boolean;
  /** Allow templates ending in `|` to run as shell pipelines */
  readonly allowFilter: boolean;
  /** Treat East Asian ambiguous-width characters as two columns */
  readonly ambiguousAsWide: boolean;
  /** Maximum nesting of recursive renders */
  readonly maxDepth: number;
}

/**
 * Load configuration from the environment.
 * Fails fast on malformed numeric or boolean values.
 */
function loadConfig(): AppConfig {
  return {
    env: optionalEnv("NODE_ENV", "development"),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    shell: optionalEnv("EXPANDO_SHELL", "/bin/sh"),
    columns: optionalEnvInt("EXPANDO_COLUMNS", 80, 0),
    arrowCursor: optionalEnvBool("EXPANDO_ARROW_CURSOR", false),
    allowFilter: optionalEnvBool("EXPANDO_ALLOW_FILTER", true),
    ambiguousAsWide: optionalEnvBool("EXPANDO_AMBIGUOUS_WIDE", false),
    maxDepth: optionalEnvInt("EXPANDO_MAX_DEPTH", 16, 1),
  };
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate the enumerated settings.
 * Call this at application startup to fail fast.
 */
export function validateConfig(): void {
  if (!["development", "production", "test"].includes(config.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${config.env}. Must be development, production, or test.`,
      "NODE_ENV"
    );
  }

  if (!["debug", "info", "warn", "error"].includes(config.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${config.logLevel}. Must be debug, info, warn, or error.`,
      "LOG_LEVEL"
    );
  }
}
