/**
 * Categorical ranking: journals, sources and similar label columns.
 *
 * Placeholder labels (the sentinels the imputer writes for missing values)
 * are removed before ranking so they never appear in the output. A genuine
 * category whose label equals a placeholder is removed too; the two cannot
 * be told apart once imputed.
 */

import { findColumn, isMissing, readField } from "../dataset/schema-probe.js";
import { requireNonNegativeInteger } from "../dataset/errors.js";
import type { CategoryCount, CategoryEntry, Dataset, FieldValue } from "../dataset/types.js";

function toLabel(value: FieldValue | undefined): string | null {
  if (value === undefined || value === null || isMissing(value)) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString().slice(0, 10);
  }
  return String(value);
}

/**
 * Rank every non-placeholder value of a field.
 * Count descending; equal counts keep first-encountered order.
 */
export function countCategories(
  dataset: Dataset,
  categoryField: string,
  placeholders: Iterable<string> = []
): CategoryCount {
  const excluded = new Set(placeholders);
  const counts = new Map<string, number>();

  for (const record of dataset) {
    const label = toLabel(readField(record, categoryField));
    if (label === null || excluded.has(label)) continue;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  const entries: CategoryEntry[] = [...counts].map(([label, count]) => ({ label, count }));
  // Array.prototype.sort is stable, so ties stay in first-seen order
  return entries.sort((a, b) => b.count - a.count);
}

/**
 * Top-n categories of a field, placeholders excluded.
 *
 * Returns fewer than n entries when fewer distinct labels exist, and an
 * empty array when the field is absent or holds only placeholders.
 *
 * @throws InvalidArgumentError if n is negative or not an integer
 */
export function topCategories(
  dataset: Dataset,
  categoryField: string,
  placeholders: Iterable<string>,
  n: number
): CategoryCount {
  requireNonNegativeInteger("n", n);
  return countCategories(dataset, categoryField, placeholders).slice(0, n);
}

/**
 * First column whose name contains the hint, case-insensitively.
 */
export function findSourceColumn(dataset: Dataset, hint = "source"): string | undefined {
  return findColumn(dataset, hint);
}

/**
 * Number of distinct non-missing values of a field.
 */
export function countDistinct(dataset: Dataset, field: string): number {
  return countCategories(dataset, field).length;
}
