/**
 * Schema probing and optional field access.
 *
 * Every component reads fields through these helpers instead of checking
 * for column existence itself, so "the column might not exist" is handled
 * in one place.
 */

import type { DataRecord, Dataset, FieldValue } from "./types.js";

/**
 * Columns present in a dataset, in first-seen order.
 */
export interface DatasetSchema {
  readonly columns: readonly string[];
  has(field: string): boolean;
}

/**
 * Discover the schema as the union of record keys.
 * A column counts as present if any record carries the key, even with null.
 */
export function probeSchema(dataset: Dataset): DatasetSchema {
  const seen = new Set<string>();
  for (const record of dataset) {
    for (const key of Object.keys(record)) {
      seen.add(key);
    }
  }
  const columns = [...seen];
  return {
    columns,
    has: (field) => seen.has(field),
  };
}

export function hasField(dataset: Dataset, field: string): boolean {
  return dataset.some((record) => Object.hasOwn(record, field));
}

/**
 * Read a field from a record.
 * Returns undefined when the record has no such key, which is distinct
 * from a present-but-null value.
 */
export function readField(record: DataRecord, field: string): FieldValue | undefined {
  return Object.hasOwn(record, field) ? record[field] : undefined;
}

/**
 * True for null, undefined and NaN numbers.
 */
export function isMissing(value: FieldValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === "number" && Number.isNaN(value));
}

/**
 * Values of a field across the dataset, skipping records without the key.
 */
export function columnValues(dataset: Dataset, field: string): Array<FieldValue> {
  const values: FieldValue[] = [];
  for (const record of dataset) {
    const value = readField(record, field);
    if (value !== undefined) {
      values.push(value);
    }
  }
  return values;
}

/**
 * First column whose lowercased name contains the lowercased hint.
 */
export function findColumn(dataset: Dataset, hint: string): string | undefined {
  const needle = hint.toLowerCase();
  return probeSchema(dataset).columns.find((column) =>
    column.toLowerCase().includes(needle)
  );
}
