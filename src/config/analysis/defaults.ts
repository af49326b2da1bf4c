/**
 * Default analysis configuration.
 *
 * Column names follow the CORD-19 `metadata.csv` layout. The stop-word list
 * combines common English function words with the terms naming the disease
 * and virus themselves, which would otherwise top every title ranking.
 */

import type { AnalysisConfig } from "./schema.js";

export const DEFAULT_STOP_WORDS: readonly string[] = [
  "the", "and", "of", "in", "to", "a", "for", "on", "with", "by",
  "an", "at", "from", "as", "is", "are", "this", "that", "these",
  "those", "be", "was", "were", "has", "have", "had", "but", "or",
  "not", "no", "yes", "covid", "19", "sars", "cov", "2", "coronavirus",
];

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  fields: {
    date: "publish_time",
    journal: "journal",
    title: "title",
    sourceHint: "source",
  },

  // Sentinel written by the imputer for a missing journal
  placeholders: ["Unknown Journal"],

  stopWords: [...DEFAULT_STOP_WORDS],
  minTokenLength: 3,

  topNOptions: [5, 10, 15, 20],
  topN: 10,

  wordTableSize: 20,
  wordChartSize: 10,
  cloudMaxWords: 100,

  yearBounds: {
    floor: 1900,
    ceiling: 2030,
    fallbackMin: 2015,
    fallbackMax: 2023,
  },

  sampleColumns: ["title", "journal", "authors", "publish_time", "doi", "abstract"],
  sampleSize: 10,
};
