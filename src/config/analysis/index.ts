/**
 * Analysis configuration module.
 *
 * Usage:
 *   import {
 *     loadAnalysisConfig,
 *     DEFAULT_ANALYSIS_CONFIG,
 *     DEFAULT_STOP_WORDS,
 *   } from "./config/analysis/index.js";
 *
 *   const config = loadAnalysisConfig(DEFAULT_ANALYSIS_CONFIG);
 *
 *   const custom = loadAnalysisConfig({
 *     ...DEFAULT_ANALYSIS_CONFIG,
 *     stopWords: [...DEFAULT_STOP_WORDS, "pandemic"],
 *   });
 */

export type { AnalysisConfig, FieldNames, YearBounds } from "./schema.js";

export {
  AnalysisConfigSchema,
  FieldNamesSchema,
  YearBoundsSchema,
  SAMPLE_SIZE_RANGE,
} from "./schema.js";

export {
  loadAnalysisConfig,
  loadAnalysisConfigFile,
  validateAnalysisConfig,
  AnalysisConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_ANALYSIS_CONFIG, DEFAULT_STOP_WORDS } from "./defaults.js";
