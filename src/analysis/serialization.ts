/**
 * JSON form of an AnalysisReport.
 *
 * Maps become arrays of objects so the report survives JSON.stringify.
 * The full word-frequency map is reduced to its size; the ranked table and
 * the cloud entries carry the counts a renderer needs. Dates in sample rows
 * serialize as ISO strings.
 */

import type { AnalysisReport, SectionStatus } from "./pipeline.js";
import type { CategoryCount, DataRecord, YearRange } from "../dataset/types.js";
import type { CloudWord, RankedWord } from "../aggregators/text-frequency.js";
import type { DatasetOverview, MissingValueEntry } from "./overview.js";

export interface SerializedReport {
  generatedAt: string;
  overview: DatasetOverview;
  missing: readonly MissingValueEntry[];
  missingAfterImputation: readonly MissingValueEntry[];
  timeline: {
    status: SectionStatus;
    field: string;
    range: YearRange;
    datedRecords: number;
    counts: Array<{ year: number; count: number }>;
  };
  journals: { status: SectionStatus; field: string | null; topN: number; entries: CategoryCount };
  sources: { status: SectionStatus; field: string | null; entries: CategoryCount };
  words: {
    status: SectionStatus;
    field: string;
    distinctWords: number;
    table: readonly RankedWord[];
    cloud: readonly CloudWord[];
  };
  sample: { status: SectionStatus; columns: readonly string[]; rows: readonly DataRecord[] };
}

export function toSerializable(report: AnalysisReport): SerializedReport {
  const { timeline, journals, sources, words, sample } = report;
  return {
    generatedAt: report.generatedAt,
    overview: report.overview,
    missing: report.missing,
    missingAfterImputation: report.missingAfterImputation,
    timeline: {
      status: timeline.status,
      field: timeline.field,
      range: timeline.range,
      datedRecords: timeline.datedRecords,
      counts: [...timeline.counts].map(([year, count]) => ({ year, count })),
    },
    journals: {
      status: journals.status,
      field: journals.field,
      topN: journals.topN,
      entries: journals.entries,
    },
    sources: { status: sources.status, field: sources.field, entries: sources.entries },
    words: {
      status: words.status,
      field: words.field,
      distinctWords: words.frequencies.size,
      table: words.table,
      cloud: words.cloud,
    },
    sample: { status: sample.status, columns: sample.columns, rows: sample.rows },
  };
}

/**
 * Serialize a report to a JSON string.
 *
 * @param pretty - Whether to format with indentation (default: true)
 */
export function serializeReport(report: AnalysisReport, pretty = true): string {
  return JSON.stringify(toSerializable(report), null, pretty ? 2 : undefined);
}
