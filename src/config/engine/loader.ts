/**
 * Engine configuration loader and validator.
 *
 * Responsible for:
 * - Loading configuration from an object or a JSON file
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing configuration to enforce immutability
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { EngineError } from "../../errors.js";
import { EngineConfigSchema, type EngineConfig } from "./schema.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or "json" / "io" for file problems */
  code: string;
}

/**
 * Structured validation error for engine configuration.
 */
export class EngineConfigError extends EngineError {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super("ENGINE_CONFIG_INVALID", message);
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Engine configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Validate and load engine configuration.
 *
 * @throws EngineConfigError if validation fails
 */
export function loadEngineConfig(input: unknown): Readonly<EngineConfig> {
  const result = EngineConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new EngineConfigError(
      `Invalid engine configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Read and validate a JSON configuration file.
 *
 * @throws EngineConfigError if the file is unreadable, not JSON, or invalid
 */
export function loadEngineConfigFile(path: string): Readonly<EngineConfig> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new EngineConfigError(`Cannot read engine configuration ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "io" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new EngineConfigError(`Engine configuration ${path} is not valid JSON`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "json" },
    ]);
  }

  return loadEngineConfig(parsed);
}

/**
 * Validate engine configuration without loading.
 * Useful for checking config files before committing to a run.
 */
export function validateEngineConfig(input: unknown): {
  success: boolean;
  config?: EngineConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = EngineConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}
