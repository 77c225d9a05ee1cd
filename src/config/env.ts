/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly key?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value !== undefined && value !== "" ? value : undefined;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * Get an optional environment variable as an integer, at least `min`.
 */
export function optionalEnvInt(key: string, defaultValue: number, min = Number.MIN_SAFE_INTEGER): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || !/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`,
      key
    );
  }
  if (parsed < min) {
    throw new ConfigError(`Environment variable ${key} must be >= ${min}, got: ${parsed}`, key);
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`,
    key
  );
}
