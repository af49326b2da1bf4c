/**
 * Dataset overview: headline counts, missing-value report, sample rows.
 */

import { hasField, isMissing, probeSchema, readField } from "../dataset/schema-probe.js";
import { requirePositiveInteger } from "../dataset/errors.js";
import type { DataRecord, Dataset, FieldValue } from "../dataset/types.js";
import { countDistinct } from "../aggregators/categorical.js";

export interface DatasetOverview {
  readonly totalRecords: number;
  readonly totalColumns: number;
  /** Distinct non-missing journals, or null when the column is absent */
  readonly uniqueJournals: number | null;
}

export interface MissingValueEntry {
  readonly column: string;
  readonly missing: number;
}

export interface DatasetSample {
  /** Preferred columns present in the dataset, in preferred order */
  readonly columns: readonly string[];
  readonly rows: readonly DataRecord[];
}

export function summarizeDataset(dataset: Dataset, journalField: string): DatasetOverview {
  return {
    totalRecords: dataset.length,
    totalColumns: probeSchema(dataset).columns.length,
    uniqueJournals: hasField(dataset, journalField) ? countDistinct(dataset, journalField) : null,
  };
}

/**
 * Missing values per column, schema order, columns with none omitted.
 * A record lacking the column entirely counts as missing for it.
 */
export function missingValueReport(dataset: Dataset): MissingValueEntry[] {
  const report: MissingValueEntry[] = [];
  for (const column of probeSchema(dataset).columns) {
    let missing = 0;
    for (const record of dataset) {
      if (isMissing(readField(record, column))) missing++;
    }
    if (missing > 0) {
      report.push({ column, missing });
    }
  }
  return report;
}

/**
 * First `size` records projected onto the preferred columns that exist.
 *
 * @throws InvalidArgumentError if size is not a positive integer
 */
export function sampleRecords(
  dataset: Dataset,
  size: number,
  preferredColumns: readonly string[]
): DatasetSample {
  requirePositiveInteger("size", size);

  const schema = probeSchema(dataset);
  const columns = preferredColumns.filter((column) => schema.has(column));
  if (columns.length === 0) {
    return { columns, rows: [] };
  }

  const rows = dataset.slice(0, size).map((record) => {
    const projected: Record<string, FieldValue> = {};
    for (const column of columns) {
      const value = readField(record, column);
      if (value !== undefined) {
        projected[column] = value;
      }
    }
    return projected;
  });
  return { columns, rows };
}
