/**
 * CSV dataset loading.
 *
 * Parses metadata CSV text into a Dataset:
 *   - the first line is the header and names the columns
 *   - a leading BOM and blank lines are ignored
 *   - empty cells become null
 *   - numeric cells become numbers when the number prints back as the
 *     same text; identifiers such as "2004.01010" or "00123" stay strings
 *   - a short row simply lacks the trailing columns (absent, not null)
 *
 * Loading is the only part of the pipeline that can fail outright: text that
 * is not valid CSV, or a file that cannot be read, raises DatasetLoadError.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import { DatasetLoadError, requireNonNegativeInteger } from "./errors.js";
import type { Dataset } from "./types.js";

export interface CsvLoadOptions {
  /** Stop after this many data rows; 0 reads them all */
  maxRows?: number;
}

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

const CsvRowsSchema = z.array(
  z.record(z.string(), z.union([z.string(), z.number(), z.null()]))
);

/**
 * Convert a raw cell to a typed value.
 *
 * A numeric cell is converted only if no digit is lost or reformatted:
 * integers must be safe integers and String(number) must equal the text.
 */
export function coerceCell(value: string): string | number | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (numericPattern.test(trimmed)) {
    const parsed = Number(trimmed);
    if (Number.isInteger(parsed) && !Number.isSafeInteger(parsed)) {
      return value;
    }
    if (Number.isFinite(parsed) && String(parsed) === trimmed) {
      return parsed;
    }
  }
  return value;
}

/**
 * Parse CSV text into a Dataset.
 *
 * @param text - CSV content, header row first
 * @param source - Label used in error messages (file path or "<inline>")
 * @throws DatasetLoadError if the text is not valid CSV
 * @throws InvalidArgumentError if maxRows is negative or fractional
 */
export function parseCsvDataset(
  text: string,
  options: CsvLoadOptions = {},
  source = "<inline>"
): Dataset {
  const maxRows = options.maxRows ?? 0;
  requireNonNegativeInteger("maxRows", maxRows);

  let raw: unknown;
  try {
    raw = parse(text, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
      ...(maxRows > 0 ? { to: maxRows } : {}),
      cast: (value, context) => (context.header ? value : coerceCell(value)),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DatasetLoadError(source, `Malformed CSV in ${source}: ${message}`);
  }

  const rows = CsvRowsSchema.safeParse(raw);
  if (!rows.success) {
    throw new DatasetLoadError(
      source,
      `Unexpected row shape in ${source}: ${rows.error.issues[0]?.message ?? "unknown issue"}`
    );
  }
  return rows.data;
}

/**
 * Read and parse a CSV file.
 *
 * @throws DatasetLoadError if the file cannot be read or parsed
 */
export function loadCsvDataset(filePath: string, options: CsvLoadOptions = {}): Dataset {
  return parseCsvDataset(readCsvText(filePath), options, resolve(filePath));
}

/**
 * Read a CSV file's text.
 *
 * @throws DatasetLoadError if the file cannot be read
 */
export function readCsvText(filePath: string): string {
  const resolved = resolve(filePath);
  try {
    return readFileSync(resolved, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new DatasetLoadError(resolved, `Could not read dataset file ${resolved}: ${message}`);
  }
}
