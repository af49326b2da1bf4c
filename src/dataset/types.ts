/**
 * Core dataset and aggregate types.
 *
 * Columns are discovered at load time, so a record is an open mapping
 * from column name to value. A column can be missing from a record
 * altogether (the key is absent) or present with a null value; the two
 * cases are treated differently by the imputer.
 */

/** A single cell value. */
export type FieldValue = string | number | Date | null;

/** One row of the dataset. */
export type DataRecord = Readonly<Record<string, FieldValue>>;

/** Rows in source order. Aggregation never depends on the order. */
export type Dataset = ReadonlyArray<DataRecord>;

/** Inclusive year range. */
export interface YearRange {
  readonly min: number;
  readonly max: number;
}

/** Year → record count, keys ascending. */
export type YearCount = ReadonlyMap<number, number>;

export interface CategoryEntry {
  readonly label: string;
  readonly count: number;
}

/** Ranked categories, count descending, ties in first-seen order. */
export type CategoryCount = ReadonlyArray<CategoryEntry>;

/** Token → occurrences, keys in first-occurrence order. */
export type WordFrequency = ReadonlyMap<string, number>;
