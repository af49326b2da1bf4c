/**
 * Temporal aggregation: publications per year.
 *
 * Years come from the date field of each record. Records whose date does
 * not parse are skipped here even though the imputer normally guarantees a
 * valid date, so partially imputed input still counts correctly.
 */

import { readField } from "../dataset/schema-probe.js";
import { yearOf } from "../dataset/dates.js";
import type { Dataset, YearCount, YearRange } from "../dataset/types.js";
import type { YearBounds } from "../config/analysis/schema.js";

/**
 * Count records per year across the whole dataset, keys ascending.
 */
export function countAllYears(dataset: Dataset, dateField: string): YearCount {
  const counts = new Map<number, number>();
  for (const record of dataset) {
    const year = yearOf(readField(record, dateField));
    if (year === null) continue;
    counts.set(year, (counts.get(year) ?? 0) + 1);
  }
  return new Map([...counts.entries()].sort(([a], [b]) => a - b));
}

/**
 * Keep the years inside the inclusive range. The range is applied
 * literally; an inverted range yields an empty result.
 */
export function filterYearRange(counts: YearCount, range: YearRange): YearCount {
  const filtered = new Map<number, number>();
  for (const [year, count] of counts) {
    if (year >= range.min && year <= range.max) {
      filtered.set(year, count);
    }
  }
  return filtered;
}

/**
 * Count records per year, restricted to an inclusive year range.
 *
 * Returns an empty map when no date parses or no year falls in range.
 */
export function countByYear(dataset: Dataset, dateField: string, range: YearRange): YearCount {
  return filterYearRange(countAllYears(dataset, dateField), range);
}

export function totalCount(counts: YearCount): number {
  let total = 0;
  for (const count of counts.values()) {
    total += count;
  }
  return total;
}

/**
 * Default year range for a dataset: the observed minimum and maximum year,
 * with implausible ends replaced by the configured fallbacks.
 *
 * - min below bounds.floor   → bounds.fallbackMin
 * - max above bounds.ceiling → bounds.fallbackMax
 * - no parseable dates, or the substitutions cross → the fallback range
 */
export function deriveYearRange(
  dataset: Dataset,
  dateField: string,
  bounds: YearBounds
): YearRange {
  const fallback: YearRange = { min: bounds.fallbackMin, max: bounds.fallbackMax };
  const years = [...countAllYears(dataset, dateField).keys()];
  const first = years[0];
  const last = years[years.length - 1];
  if (first === undefined || last === undefined) {
    return fallback;
  }

  const min = first < bounds.floor ? bounds.fallbackMin : first;
  const max = last > bounds.ceiling ? bounds.fallbackMax : last;
  return min <= max ? { min, max } : fallback;
}

/**
 * Combine a caller-requested range with the derived default. A requested
 * bound that is unset, fractional, or outside [floor, ceiling] is replaced
 * by the derived bound.
 */
export function resolveYearRange(
  requested: Partial<YearRange>,
  derived: YearRange,
  bounds: YearBounds
): YearRange {
  const sane = (year: number | undefined): year is number =>
    year !== undefined &&
    Number.isInteger(year) &&
    year >= bounds.floor &&
    year <= bounds.ceiling;

  return {
    min: sane(requested.min) ? requested.min : derived.min,
    max: sane(requested.max) ? requested.max : derived.max,
  };
}
