/**
 * Analysis pipeline tests.
 *
 * Run: node --import tsx src/analysis/pipeline.test.ts
 *
 * Tests cover:
 *   1. Overview helpers: summary, missing-value report, sample rows
 *   2. analyzeDataset: section contents, statuses, options, logging
 *   3. Serialization: JSON shape of a report
 */

import { strict as assert } from "node:assert";

import {
  analyzeDataset,
  missingValueReport,
  sampleRecords,
  serializeReport,
  summarizeDataset,
  toSerializable,
  type SerializedReport,
} from "./index.js";
import { DEFAULT_ANALYSIS_CONFIG, loadAnalysisConfig } from "../config/analysis/index.js";
import { InvalidArgumentError } from "../dataset/errors.js";
import { createDefaultTable } from "../imputer/default-table.js";
import { createLogger, type LogEntry, type Logger } from "../logging/index.js";
import type { Dataset } from "../dataset/types.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function recordingLogger(entries: LogEntry[]): Logger {
  return createLogger({
    level: "debug",
    console: false,
    sinks: [(entry) => entries.push(entry)],
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const CONFIG = loadAnalysisConfig(DEFAULT_ANALYSIS_CONFIG);
const NOW = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));

const RAW: Dataset = [
  {
    title: "Masks reduce airborne spread",
    journal: "Journal A",
    publish_time: "2020-03-01",
    source_x: "PMC",
    authors: "Lee",
  },
  {
    title: "Airborne spread in clinics",
    journal: "Journal A",
    publish_time: "2021-07-15",
    source_x: "Medline",
    authors: null,
  },
  {
    title: null,
    journal: null,
    publish_time: "bad",
    source_x: "PMC",
    authors: "Chen",
  },
  {
    title: "Vaccine trial of masks",
    journal: "Journal B",
    publish_time: "2021-01-02",
    source_x: "PMC",
    authors: "Diaz",
  },
];

const NO_KNOWN_COLUMNS: Dataset = [{ doi: "10.1000/xyz" }, { doi: null }];

const NOTHING_TO_SHOW: Dataset = [
  { title: "The and of", journal: "Unknown Journal", publish_time: null, source_x: null },
];

// ═══════════════════════════════════════════════════════════════════════════
// OVERVIEW HELPERS
// ═══════════════════════════════════════════════════════════════════════════

section("Overview Helpers");

test("summary counts records, columns and journals", () => {
  assert.deepEqual(summarizeDataset(RAW, "journal"), {
    totalRecords: 4,
    totalColumns: 5,
    uniqueJournals: 2,
  });
});

test("summary reports N/A journals when the column is absent", () => {
  assert.equal(summarizeDataset(NO_KNOWN_COLUMNS, "journal").uniqueJournals, null);
});

test("missing-value report lists columns with gaps in schema order", () => {
  assert.deepEqual(missingValueReport(RAW), [
    { column: "title", missing: 1 },
    { column: "journal", missing: 1 },
    { column: "authors", missing: 1 },
  ]);
});

test("an absent key counts as missing for that column", () => {
  assert.deepEqual(missingValueReport([{ a: 1 }, { b: 2 }]), [
    { column: "a", missing: 1 },
    { column: "b", missing: 1 },
  ]);
});

test("a complete dataset has an empty missing-value report", () => {
  assert.deepEqual(missingValueReport([{ a: 1, b: "x" }]), []);
});

test("sample projects the preferred columns that exist", () => {
  const sample = sampleRecords(RAW, 2, ["doi", "title", "journal"]);
  assert.deepEqual(sample.columns, ["title", "journal"]);
  assert.deepEqual(sample.rows, [
    { title: "Masks reduce airborne spread", journal: "Journal A" },
    { title: "Airborne spread in clinics", journal: "Journal A" },
  ]);
});

test("sample without matching columns has no rows", () => {
  assert.deepEqual(sampleRecords(RAW, 5, ["abstract"]), { columns: [], rows: [] });
});

test("sample size must be positive", () => {
  assert.throws(() => sampleRecords(RAW, 0, ["title"]), InvalidArgumentError);
});

// ═══════════════════════════════════════════════════════════════════════════
// ANALYZE DATASET
// ═══════════════════════════════════════════════════════════════════════════

section("analyzeDataset — Full Dataset");

const REPORT = analyzeDataset(RAW, CONFIG, { now: NOW });

test("generatedAt comes from the supplied clock", () => {
  assert.equal(REPORT.generatedAt, "2024-01-02T03:04:05.000Z");
});

test("overview is computed on the imputed dataset", () => {
  assert.deepEqual(REPORT.overview, { totalRecords: 4, totalColumns: 5, uniqueJournals: 3 });
});

test("missing values are reported before imputation", () => {
  assert.deepEqual(
    REPORT.missing.map((entry) => entry.column),
    ["title", "journal", "authors"]
  );
});

test("no gaps remain after imputation when every column has a default", () => {
  assert.deepEqual(REPORT.missingAfterImputation, []);
});

test("gaps after imputation are those in columns without a default", () => {
  const report = analyzeDataset(
    [
      { cord_uid: null, title: null, journal: "Journal A" },
      { cord_uid: "ab12", title: "Masks", journal: null },
    ],
    CONFIG
  );
  assert.deepEqual(report.missing, [
    { column: "cord_uid", missing: 1 },
    { column: "title", missing: 1 },
    { column: "journal", missing: 1 },
  ]);
  assert.deepEqual(report.missingAfterImputation, [{ column: "cord_uid", missing: 1 }]);
});

test("timeline includes the baseline year in the derived range", () => {
  const { timeline } = REPORT;
  assert.equal(timeline.status, "ok");
  assert.equal(timeline.field, "publish_time");
  assert.deepEqual(timeline.range, { min: 1900, max: 2021 });
  assert.equal(timeline.datedRecords, 4);
  assert.deepEqual([...timeline.counts], [
    [1900, 1],
    [2020, 1],
    [2021, 2],
  ]);
});

test("requested year range narrows the timeline", () => {
  const report = analyzeDataset(RAW, CONFIG, { yearRange: { min: 2020, max: 2021 } });
  assert.deepEqual(report.timeline.range, { min: 2020, max: 2021 });
  assert.deepEqual([...report.timeline.counts], [
    [2020, 1],
    [2021, 2],
  ]);
  assert.equal(report.timeline.datedRecords, 4);
});

test("journals exclude the imputed placeholder", () => {
  assert.equal(REPORT.journals.status, "ok");
  assert.equal(REPORT.journals.topN, 10);
  assert.deepEqual(REPORT.journals.entries, [
    { label: "Journal A", count: 2 },
    { label: "Journal B", count: 1 },
  ]);
});

test("sources use the detected source column", () => {
  assert.equal(REPORT.sources.status, "ok");
  assert.equal(REPORT.sources.field, "source_x");
  assert.deepEqual(REPORT.sources.entries, [
    { label: "PMC", count: 3 },
    { label: "Medline", count: 1 },
  ]);
});

test("word table ranks title words, imputed titles included", () => {
  const { words } = REPORT;
  assert.equal(words.status, "ok");
  assert.equal(words.frequencies.size, 8);
  assert.equal(words.frequencies.get("title"), 1);
  assert.deepEqual(
    words.table.slice(0, 4),
    [
      { word: "masks", count: 2 },
      { word: "airborne", count: 2 },
      { word: "spread", count: 2 },
      { word: "reduce", count: 1 },
    ]
  );
  assert.equal(words.chart.length, 8);
  assert.deepEqual(words.cloud[0], { word: "masks", count: 2, weight: 1 });
  assert.deepEqual(words.cloud[3], { word: "reduce", count: 1, weight: 0.5 });
});

test("sample shows imputed values in the preferred column order", () => {
  const { sample } = REPORT;
  assert.equal(sample.status, "ok");
  assert.deepEqual(sample.columns, ["title", "journal", "authors", "publish_time"]);
  assert.equal(sample.rows.length, 4);
  assert.equal(sample.rows[2]?.["journal"], "Unknown Journal");
  assert.equal(sample.rows[1]?.["authors"], "Unknown Authors");
});

test("the raw dataset is left untouched", () => {
  assert.equal(RAW[2]?.["title"], null);
  assert.equal(RAW[2]?.["publish_time"], "bad");
});

section("analyzeDataset — Options");

test("topN option overrides the configured value", () => {
  const report = analyzeDataset(RAW, CONFIG, { topN: 5 });
  assert.equal(report.journals.topN, 5);
});

test("topN outside the allowed options is rejected", () => {
  assert.throws(() => analyzeDataset(RAW, CONFIG, { topN: 7 }), InvalidArgumentError);
});

test("sampleSize option limits the sample", () => {
  const six: Dataset = [...RAW, ...RAW.slice(0, 2)];
  const report = analyzeDataset(six, CONFIG, { sampleSize: 5 });
  assert.equal(report.sample.rows.length, 5);
});

test("sampleSize outside 5-50 is rejected", () => {
  for (const sampleSize of [0, 4, 51, 1000, 7.5]) {
    assert.throws(
      () => analyzeDataset(RAW, CONFIG, { sampleSize }),
      InvalidArgumentError,
      `sampleSize ${sampleSize}`
    );
  }
  assert.throws(() => analyzeDataset(RAW, CONFIG, { sampleSize: 1000 }), {
    message: "sampleSize must be an integer from 5 to 50, got: 1000",
  });
});

test("sampleSize bounds are inclusive", () => {
  assert.equal(analyzeDataset(RAW, CONFIG, { sampleSize: 5 }).sample.rows.length, 4);
  assert.equal(analyzeDataset(RAW, CONFIG, { sampleSize: 50 }).sample.rows.length, 4);
});

test("an empty default table skips imputation", () => {
  const report = analyzeDataset(RAW, CONFIG, { defaults: createDefaultTable([]) });
  assert.equal(report.timeline.datedRecords, 3);
  assert.deepEqual(report.timeline.range, { min: 2020, max: 2021 });
  assert.equal(report.words.frequencies.has("title"), false);
});

section("analyzeDataset — Section Statuses");

test("absent columns mark their sections missing-column", () => {
  const report = analyzeDataset(NO_KNOWN_COLUMNS, CONFIG);
  assert.equal(report.timeline.status, "missing-column");
  assert.deepEqual(report.timeline.range, { min: 2015, max: 2023 });
  assert.equal(report.timeline.datedRecords, 0);
  assert.equal(report.journals.status, "missing-column");
  assert.deepEqual(report.journals.entries, []);
  assert.equal(report.sources.status, "missing-column");
  assert.equal(report.sources.field, null);
  assert.equal(report.words.status, "missing-column");
  assert.equal(report.words.frequencies.size, 0);
});

test("sample still shows whichever preferred columns exist", () => {
  const report = analyzeDataset(NO_KNOWN_COLUMNS, CONFIG);
  assert.equal(report.sample.status, "ok");
  assert.deepEqual(report.sample.columns, ["doi"]);
  assert.equal(report.sample.rows[1]?.["doi"], "No DOI");
});

test("present columns with nothing to show are marked empty", () => {
  const report = analyzeDataset(NOTHING_TO_SHOW, CONFIG, {
    yearRange: { min: 2020, max: 2022 },
  });
  assert.equal(report.timeline.status, "empty");
  assert.equal(report.timeline.datedRecords, 1);
  assert.equal(report.journals.status, "empty");
  assert.equal(report.sources.status, "empty");
  assert.equal(report.sources.field, "source_x");
  assert.equal(report.words.status, "empty");
});

test("an empty dataset produces an all-empty report", () => {
  const report = analyzeDataset([], CONFIG);
  assert.deepEqual(report.overview, { totalRecords: 0, totalColumns: 0, uniqueJournals: null });
  assert.deepEqual(report.missing, []);
  assert.deepEqual(report.missingAfterImputation, []);
  assert.equal(report.sample.status, "missing-column");
});

section("analyzeDataset — Logging");

test("each missing column is logged as a warning", () => {
  const entries: LogEntry[] = [];
  analyzeDataset(NO_KNOWN_COLUMNS, CONFIG, { logger: recordingLogger(entries) });
  const warnings = entries.filter((entry) => entry.level === "warn");
  assert.deepEqual(
    warnings.map((entry) => entry.context["section"]),
    ["timeline", "journals", "sources", "words"]
  );
});

test("a complete dataset logs no warnings", () => {
  const entries: LogEntry[] = [];
  analyzeDataset(RAW, CONFIG, { logger: recordingLogger(entries) });
  assert.equal(entries.filter((entry) => entry.level === "warn").length, 0);
  assert.equal(entries[0]?.message, "Dataset imputed");
});

test("child logger context is attached to pipeline entries", () => {
  const entries: LogEntry[] = [];
  analyzeDataset(RAW, CONFIG, { logger: recordingLogger(entries).child({ dataset: "fixture" }) });
  assert.ok(entries.length > 0);
  assert.ok(entries.every((entry) => entry.context["dataset"] === "fixture"));
});

// ═══════════════════════════════════════════════════════════════════════════
// SERIALIZATION
// ═══════════════════════════════════════════════════════════════════════════

section("Serialization");

test("year counts become year/count objects", () => {
  assert.deepEqual(toSerializable(REPORT).timeline.counts, [
    { year: 1900, count: 1 },
    { year: 2020, count: 1 },
    { year: 2021, count: 2 },
  ]);
});

test("word frequencies are reduced to their size", () => {
  assert.equal(toSerializable(REPORT).words.distinctWords, 8);
});

test("both missing-value reports are serialized", () => {
  const serialized = toSerializable(REPORT);
  assert.equal(serialized.missing.length, 3);
  assert.deepEqual(serialized.missingAfterImputation, []);
});

test("serialized report parses back with dates as ISO strings", () => {
  const parsed: SerializedReport = JSON.parse(serializeReport(REPORT, false));
  assert.equal(parsed.generatedAt, "2024-01-02T03:04:05.000Z");
  assert.equal(parsed.journals.topN, 10);
  assert.equal(parsed.sources.field, "source_x");
  assert.equal(parsed.sample.rows[0]?.["publish_time"], "2020-03-01T00:00:00.000Z");
});

test("pretty output is indented, compact output is one line", () => {
  assert.ok(serializeReport(REPORT).includes('\n  "generatedAt"'));
  assert.equal(serializeReport(REPORT, false).includes("\n"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
