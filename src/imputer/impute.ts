/**
 * Missing-value imputation.
 */

import { isMissing } from "../dataset/schema-probe.js";
import type { DataRecord, Dataset, FieldValue } from "../dataset/types.js";
import { applyDefault, type DefaultTable } from "./default-table.js";

/**
 * Fill missing values using the default table.
 *
 * - Only fields present on a record are touched; an absent column is never
 *   added.
 * - Fields without a table entry are copied unchanged, null included.
 * - Date entries coerce every present value and fall back to the baseline
 *   when parsing fails.
 *
 * Returns new records and leaves the input untouched. Re-imputing the
 * result changes nothing.
 */
export function impute(dataset: Dataset, defaults: DefaultTable): Dataset {
  return dataset.map((record) => imputeRecord(record, defaults));
}

function imputeRecord(record: DataRecord, defaults: DefaultTable): DataRecord {
  const next: Record<string, FieldValue> = {};
  for (const [field, value] of Object.entries(record)) {
    const entry = defaults.get(field);
    next[field] = entry ? applyDefault(entry, value) : value;
  }
  return next;
}

/**
 * Count values still missing after imputation for fields that have a table
 * entry. Zero for any output of impute().
 */
export function countUncovered(dataset: Dataset, defaults: DefaultTable): number {
  let uncovered = 0;
  for (const record of dataset) {
    for (const [field, value] of Object.entries(record)) {
      if (defaults.has(field) && isMissing(value)) {
        uncovered++;
      }
    }
  }
  return uncovered;
}
