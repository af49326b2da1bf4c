/**
 * Dataset model, schema probing, date parsing, loading and caching.
 */

export type {
  FieldValue,
  DataRecord,
  Dataset,
  YearRange,
  YearCount,
  CategoryEntry,
  CategoryCount,
  WordFrequency,
} from "./types.js";

export {
  InvalidArgumentError,
  DatasetLoadError,
  requireNonNegativeInteger,
  requirePositiveInteger,
} from "./errors.js";

export {
  probeSchema,
  hasField,
  readField,
  isMissing,
  columnValues,
  findColumn,
  type DatasetSchema,
} from "./schema-probe.js";

export { parseDate, yearOf, DATE_DOMAIN } from "./dates.js";

export {
  parseCsvDataset,
  loadCsvDataset,
  readCsvText,
  coerceCell,
  type CsvLoadOptions,
} from "./loader.js";

export {
  DatasetCache,
  fingerprint,
  type DatasetBuilder,
  type CacheEntry,
} from "./cache.js";
