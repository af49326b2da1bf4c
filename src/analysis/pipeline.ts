/**
 * End-to-end analysis of a raw metadata dataset.
 *
 * raw dataset ─▶ impute ─┬─▶ timeline  (countByYear)
 *                        ├─▶ journals  (topCategories)
 *                        ├─▶ sources   (countCategories on the detected column)
 *                        ├─▶ words     (wordFrequencies → table, chart, cloud)
 *                        └─▶ overview + sample
 *
 * Missing values are reported twice: on the raw dataset, before imputation
 * hides the gaps, and on the imputed dataset, where only columns without a
 * default (or records lacking the key) still have gaps. Every section carries a status so a renderer
 * can tell "column not found" from "nothing to show".
 */

import { SAMPLE_SIZE_RANGE, type AnalysisConfig } from "../config/analysis/schema.js";
import { InvalidArgumentError } from "../dataset/errors.js";
import { hasField } from "../dataset/schema-probe.js";
import type { CategoryCount, Dataset, WordFrequency, YearCount, YearRange } from "../dataset/types.js";
import { impute } from "../imputer/impute.js";
import { PAPER_METADATA_DEFAULTS, type DefaultTable } from "../imputer/default-table.js";
import {
  countAllYears,
  deriveYearRange,
  filterYearRange,
  resolveYearRange,
  totalCount,
} from "../aggregators/temporal.js";
import { countCategories, findSourceColumn, topCategories } from "../aggregators/categorical.js";
import {
  cloudWeights,
  topWords,
  wordFrequencies,
  type CloudWord,
  type RankedWord,
} from "../aggregators/text-frequency.js";
import type { Logger } from "../logging/index.js";
import {
  missingValueReport,
  sampleRecords,
  summarizeDataset,
  type DatasetOverview,
  type DatasetSample,
  type MissingValueEntry,
} from "./overview.js";

export type SectionStatus = "ok" | "empty" | "missing-column";

export interface TimelineSection {
  readonly status: SectionStatus;
  readonly field: string;
  /** Range actually applied */
  readonly range: YearRange;
  /** Records with a parseable date, before range filtering */
  readonly datedRecords: number;
  readonly counts: YearCount;
}

export interface RankingSection {
  readonly status: SectionStatus;
  /** Column ranked, or null when no column matched */
  readonly field: string | null;
  readonly entries: CategoryCount;
}

export interface WordsSection {
  readonly status: SectionStatus;
  readonly field: string;
  readonly frequencies: WordFrequency;
  readonly table: readonly RankedWord[];
  readonly chart: readonly RankedWord[];
  readonly cloud: readonly CloudWord[];
}

export interface SampleSection extends DatasetSample {
  readonly status: SectionStatus;
}

export interface AnalysisReport {
  readonly generatedAt: string;
  readonly overview: DatasetOverview;
  /** Gaps in the raw dataset */
  readonly missing: readonly MissingValueEntry[];
  /** Gaps left after imputation */
  readonly missingAfterImputation: readonly MissingValueEntry[];
  readonly timeline: TimelineSection;
  readonly journals: RankingSection & { readonly topN: number };
  readonly sources: RankingSection;
  readonly words: WordsSection;
  readonly sample: SampleSection;
}

export interface AnalyzeOptions {
  /** Requested year range; unset or implausible bounds use the derived range */
  yearRange?: Partial<YearRange>;
  /** Overrides config.topN; must be one of config.topNOptions */
  topN?: number;
  /** Overrides config.sampleSize; same 5-50 bounds */
  sampleSize?: number;
  /** Column defaults; PAPER_METADATA_DEFAULTS when omitted */
  defaults?: DefaultTable;
  logger?: Logger;
  /** Clock for generatedAt */
  now?: Date;
}

function statusOf(present: boolean, size: number): SectionStatus {
  if (!present) return "missing-column";
  return size > 0 ? "ok" : "empty";
}

/**
 * Impute a raw dataset and compute every aggregate view.
 *
 * @throws InvalidArgumentError if topN is not one of config.topNOptions or
 *         sampleSize is not an integer within SAMPLE_SIZE_RANGE
 */
export function analyzeDataset(
  raw: Dataset,
  config: AnalysisConfig,
  options: AnalyzeOptions = {}
): AnalysisReport {
  const topN = options.topN ?? config.topN;
  if (!config.topNOptions.includes(topN)) {
    throw new InvalidArgumentError(
      "topN",
      `topN must be one of ${config.topNOptions.join(", ")}, got: ${topN}`
    );
  }
  const sampleSize = options.sampleSize ?? config.sampleSize;
  if (
    !Number.isInteger(sampleSize) ||
    sampleSize < SAMPLE_SIZE_RANGE.min ||
    sampleSize > SAMPLE_SIZE_RANGE.max
  ) {
    throw new InvalidArgumentError(
      "sampleSize",
      `sampleSize must be an integer from ${SAMPLE_SIZE_RANGE.min} to ${SAMPLE_SIZE_RANGE.max}, got: ${sampleSize}`
    );
  }
  const logger = options.logger;
  const { fields } = config;

  const dataset = impute(raw, options.defaults ?? PAPER_METADATA_DEFAULTS);
  logger?.debug("Dataset imputed", { records: dataset.length });

  // Timeline
  const hasDate = hasField(dataset, fields.date);
  const allYears = countAllYears(dataset, fields.date);
  const derived = deriveYearRange(dataset, fields.date, config.yearBounds);
  const range = resolveYearRange(options.yearRange ?? {}, derived, config.yearBounds);
  const counts = filterYearRange(allYears, range);
  const timeline: TimelineSection = {
    status: statusOf(hasDate, counts.size),
    field: fields.date,
    range,
    datedRecords: totalCount(allYears),
    counts,
  };

  // Journals
  const journalEntries = topCategories(dataset, fields.journal, config.placeholders, topN);
  const journals = {
    status: statusOf(hasField(dataset, fields.journal), journalEntries.length),
    field: fields.journal,
    topN,
    entries: journalEntries,
  };

  // Sources
  const sourceField = findSourceColumn(dataset, fields.sourceHint);
  const sourceEntries = sourceField === undefined ? [] : countCategories(dataset, sourceField);
  const sources: RankingSection = {
    status: statusOf(sourceField !== undefined, sourceEntries.length),
    field: sourceField ?? null,
    entries: sourceEntries,
  };

  // Words
  const frequencies = wordFrequencies(
    dataset,
    fields.title,
    config.stopWords,
    config.minTokenLength
  );
  const table = topWords(frequencies, config.wordTableSize);
  const words: WordsSection = {
    status: statusOf(hasField(dataset, fields.title), frequencies.size),
    field: fields.title,
    frequencies,
    table,
    chart: table.slice(0, config.wordChartSize),
    cloud: cloudWeights(frequencies, config.cloudMaxWords),
  };

  // Sample
  const sampleData = sampleRecords(dataset, sampleSize, config.sampleColumns);
  const sample: SampleSection = {
    status: statusOf(sampleData.columns.length > 0, sampleData.rows.length),
    ...sampleData,
  };

  for (const [name, section] of [
    ["timeline", timeline],
    ["journals", journals],
    ["sources", sources],
    ["words", words],
    ["sample", sample],
  ] as const) {
    if (section.status === "missing-column") {
      logger?.warn("Column not found; section left empty", { section: name });
    } else {
      logger?.debug("Section computed", { section: name, status: section.status });
    }
  }

  return {
    generatedAt: (options.now ?? new Date()).toISOString(),
    overview: summarizeDataset(dataset, fields.journal),
    missing: missingValueReport(raw),
    missingAfterImputation: missingValueReport(dataset),
    timeline,
    journals,
    sources,
    words,
    sample,
  };
}
