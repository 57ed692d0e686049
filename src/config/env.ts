/**
 * Environment variable access.
 *
 * `.env` is loaded on import. An empty variable counts as unset, so
 * `LOG_LEVEL=` in a `.env` file falls back to the default like a missing one.
 */

import "dotenv/config";
import { EngineError } from "../errors.js";

export class ConfigError extends EngineError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
  }
}

const TRUE_VALUES = ["true", "1", "yes"];
const FALSE_VALUES = ["false", "0", "no"];

function readEnv(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

export function optionalEnv(key: string, defaultValue: string): string {
  return readEnv(key) ?? defaultValue;
}

/**
 * Unset variables read as null.
 */
export function optionalEnvOrNull(key: string): string | null {
  return readEnv(key) ?? null;
}

/**
 * Base-10 integer; trailing text after the digits is rejected.
 */
export function optionalEnvInt(key: string, defaultValue: number): number {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`Environment variable ${key} must be a valid integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

/**
 * true/false, 1/0 or yes/no, in any case.
 */
export function optionalEnvBool(key: string, defaultValue: boolean): boolean {
  const value = readEnv(key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (${[...TRUE_VALUES, ...FALSE_VALUES].join("/")}), got: ${value}`
  );
}
