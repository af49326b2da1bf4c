/**
 * Column default table.
 *
 * Each entry is a tagged variant: the kind decides how a raw value is
 * coerced and what the fallback is. Text and numeric entries only replace
 * missing values; a date entry also replaces values that cannot be parsed,
 * so "missing" and "unparseable" both end up at the baseline date.
 */

import { isMissing } from "../dataset/schema-probe.js";
import { parseDate } from "../dataset/dates.js";
import type { FieldValue } from "../dataset/types.js";

export type FieldKind = "text" | "numeric" | "date";

/**
 * Coerce a raw present value. Returns null when the value must be replaced
 * by the entry's fallback.
 */
export type Coercer = (raw: FieldValue) => FieldValue;

export type FieldDefault =
  | { readonly kind: "text"; readonly fallback: string; readonly coerce: Coercer }
  | { readonly kind: "numeric"; readonly fallback: number; readonly coerce: Coercer }
  | { readonly kind: "date"; readonly fallback: Date; readonly coerce: Coercer };

export type DefaultTable = ReadonlyMap<string, FieldDefault>;

const keepPresent: Coercer = (raw) => (isMissing(raw) ? null : raw);

export function textDefault(fallback: string): FieldDefault {
  return { kind: "text", fallback, coerce: keepPresent };
}

export function numericDefault(fallback: number): FieldDefault {
  return { kind: "numeric", fallback, coerce: keepPresent };
}

/**
 * @param baseline - ISO date used for missing and unparseable values
 */
export function dateDefault(baseline: string): FieldDefault {
  const fallback = parseDate(baseline);
  if (fallback === null) {
    throw new Error(`Baseline date is not parseable: ${baseline}`);
  }
  return { kind: "date", fallback, coerce: (raw) => parseDate(raw) };
}

/**
 * Resolve a present value against its table entry. Never returns null.
 */
export function applyDefault(entry: FieldDefault, raw: FieldValue): FieldValue {
  const coerced = entry.coerce(raw);
  if (coerced !== null) {
    return coerced;
  }
  switch (entry.kind) {
    case "date":
      // Fresh copy per record; Date instances are mutable
      return new Date(entry.fallback.getTime());
    case "text":
    case "numeric":
      return entry.fallback;
  }
}

export function createDefaultTable(
  entries: Iterable<readonly [string, FieldDefault]>
): DefaultTable {
  return new Map(entries);
}

/** Baseline publication date for missing and unparseable values. */
export const BASELINE_PUBLISH_DATE = "1900-01-01";

/**
 * Defaults for the CORD-19 paper metadata columns.
 */
export const PAPER_METADATA_DEFAULTS: DefaultTable = createDefaultTable([
  ["title", textDefault("No Title")],
  ["doi", textDefault("No DOI")],
  ["pmcid", textDefault("No PMCID")],
  ["pubmed_id", textDefault("No PubMed ID")],
  ["abstract", textDefault("No Abstract")],
  ["publish_time", dateDefault(BASELINE_PUBLISH_DATE)],
  ["authors", textDefault("Unknown Authors")],
  ["journal", textDefault("Unknown Journal")],
  ["who_covidence_id", textDefault("No Covidence ID")],
  ["arxiv_id", textDefault("No ArXiv ID")],
  ["pdf_json_files", textDefault("No PDF JSON")],
  ["pmc_json_files", textDefault("No PMC JSON")],
  ["url", textDefault("No URL")],
  ["sha", textDefault("No SHA")],
  ["mag_id", numericDefault(0)],
  ["s2_id", numericDefault(0)],
]);
