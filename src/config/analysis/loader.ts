/**
 * Analysis configuration loader and validator.
 *
 * Responsible for:
 * - Validating configuration against the schema with fail-fast behavior
 * - Merging JSON override files over the defaults
 * - Producing structured error messages
 * - Freezing configuration so no pipeline stage can alter it mid-run
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ZodIssue } from "zod";

import { AnalysisConfigSchema, type AnalysisConfig } from "./schema.js";
import { DEFAULT_ANALYSIS_CONFIG } from "./defaults.js";

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code, or "file" for problems reading an override file */
  code: string;
}

/**
 * Structured validation error for analysis configuration.
 */
export class AnalysisConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "AnalysisConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Analysis configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate and load analysis configuration.
 *
 * @param input - Raw configuration object to validate
 * @returns Validated and frozen AnalysisConfig
 * @throws AnalysisConfigError if validation fails
 */
export function loadAnalysisConfig(input: unknown): Readonly<AnalysisConfig> {
  const result = AnalysisConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new AnalysisConfigError(
      `Invalid analysis configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Validate analysis configuration without loading.
 */
export function validateAnalysisConfig(input: unknown): {
  success: boolean;
  config?: AnalysisConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = AnalysisConfigSchema.safeParse(input);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Load a JSON override file and merge its top-level keys over
 * DEFAULT_ANALYSIS_CONFIG. Nested objects (fields, yearBounds) are
 * replaced whole, not merged.
 *
 * @throws AnalysisConfigError if the file is missing, is not a JSON object,
 *         or the merged result fails validation
 */
export function loadAnalysisConfigFile(filePath: string): Readonly<AnalysisConfig> {
  const resolved = resolve(filePath);

  if (!existsSync(resolved)) {
    throw new AnalysisConfigError(`Analysis config file not found: ${resolved}`, [
      { path: [], message: `File not found: ${resolved}`, code: "file" },
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new AnalysisConfigError(`Analysis config file is not valid JSON: ${resolved}`, [
      { path: [], message, code: "file" },
    ]);
  }

  if (!isPlainObject(parsed)) {
    throw new AnalysisConfigError(`Analysis config file must contain a JSON object: ${resolved}`, [
      { path: [], message: "Expected a JSON object at the top level", code: "file" },
    ]);
  }

  return loadAnalysisConfig({ ...DEFAULT_ANALYSIS_CONFIG, ...parsed });
}
