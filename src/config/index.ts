/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import {
  optionalEnv,
  optionalEnvBool,
  optionalEnvChoice,
  optionalEnvInt,
} from "./env.js";
import type { LogLevel } from "../logging/index.js";

export {
  ConfigError,
  requireEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  optionalEnvChoice,
} from "./env.js";

// Re-export analysis configuration module
export * from "./analysis/index.js";

export const RUNTIME_ENVIRONMENTS = ["development", "production", "test"] as const;
export type RuntimeEnvironment = (typeof RUNTIME_ENVIRONMENTS)[number];

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: RuntimeEnvironment;
  readonly logLevel: LogLevel;
  /** Write log lines to output/logs in addition to the console */
  readonly logToFile: boolean;
  readonly appName: string;
  /** Metadata CSV loaded when the CLI is given no --data option */
  readonly dataPath: string;
  /** Row limit applied while loading; 0 loads every row */
  readonly maxRows: number;
}

/**
 * Load and validate application configuration from the environment.
 * Throws ConfigError on the first invalid value.
 */
export function loadAppConfig(): AppConfig {
  return {
    env: optionalEnvChoice("NODE_ENV", RUNTIME_ENVIRONMENTS, "development"),
    logLevel: optionalEnvChoice("LOG_LEVEL", LOG_LEVELS, "info"),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
    appName: optionalEnv("APP_NAME", "paper-explorer"),
    dataPath: optionalEnv("DATA_PATH", "metadata.csv"),
    maxRows: optionalEnvInt("MAX_ROWS", 3000),
  };
}
