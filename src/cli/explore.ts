#!/usr/bin/env node
/**
 * CLI for exploring a paper metadata CSV.
 *
 * Loads the CSV, imputes missing values, and prints:
 * - Dataset overview and missing-data counts
 * - Publications per year within a year range
 * - Top journals and the source distribution
 * - Most frequent title words and cloud weights
 * - Sample rows
 *
 * Usage:
 *   npx tsx src/cli/explore.ts [options]
 *   npm run explore -- [options]
 *
 * Options:
 *   --data <path>     Metadata CSV (default: DATA_PATH or metadata.csv)
 *   --rows <n>        Read at most n rows; 0 reads all (default: MAX_ROWS or 3000)
 *   --from <year>     First year of the timeline
 *   --to <year>       Last year of the timeline
 *   --top <n>         Journals to rank: 5, 10, 15 or 20 (default: 10)
 *   --config <path>   JSON file overriding the analysis configuration
 *   --sample <n>      Sample rows to show, 5-50 (default: 10)
 *   --json            Print the report as JSON
 *   --verbose         Log pipeline details
 *   -h, --help        Show help
 *
 * Exit codes:
 *   0 - Report printed
 *   1 - Configuration, argument, or load error, or an empty dataset
 */

import { parseArgs } from "node:util";

import {
  AnalysisConfigError,
  ConfigError,
  DEFAULT_ANALYSIS_CONFIG,
  loadAnalysisConfig,
  loadAnalysisConfigFile,
  loadAppConfig,
} from "../config/index.js";
import {
  DatasetCache,
  DatasetLoadError,
  InvalidArgumentError,
  parseCsvDataset,
} from "../dataset/index.js";
import { analyzeDataset, serializeReport, type AnalysisReport } from "../analysis/index.js";
import { createLogger, initRunId } from "../logging/index.js";

// ============================================================
// Argument parsing
// ============================================================

const HELP_TEXT = `
Usage: paper-explorer [options]

Options:
  --data <path>     Metadata CSV (default: DATA_PATH or metadata.csv)
  --rows <n>        Read at most n rows; 0 reads all (default: MAX_ROWS or 3000)
  --from <year>     First year of the timeline
  --to <year>       Last year of the timeline
  --top <n>         Journals to rank: 5, 10, 15 or 20 (default: 10)
  --config <path>   JSON file overriding the analysis configuration
  --sample <n>      Sample rows to show, 5-50 (default: 10)
  --json            Print the report as JSON
  --verbose         Log pipeline details
  -h, --help        Show this help message
`;

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      data: { type: "string" },
      rows: { type: "string" },
      from: { type: "string" },
      to: { type: "string" },
      top: { type: "string" },
      config: { type: "string" },
      sample: { type: "string" },
      json: { type: "boolean", default: false },
      verbose: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  return values;
}

/**
 * Parse an integer option value. Undefined stays undefined.
 *
 * @throws InvalidArgumentError for anything but an optionally signed integer
 */
export function parseIntOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(name, `--${name} must be an integer, got: ${value}`);
  }
  return parseInt(value, 10);
}

// ============================================================
// Output formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

type Color = keyof typeof COLORS;

export interface RenderOptions {
  color: boolean;
  /** Widest bar, in characters */
  barWidth?: number;
  /** Labels longer than this are truncated */
  labelWidth?: number;
}

const MAX_LABEL_WIDTH = 40;
const BAR_WIDTH = 30;

/**
 * Horizontal bar proportional to value / max. Any positive value gets at
 * least one block.
 */
export function formatBar(value: number, max: number, width = BAR_WIDTH): string {
  if (max <= 0 || value <= 0) return "";
  return "█".repeat(Math.max(1, Math.round((value / max) * width)));
}

export function truncateLabel(label: string, width = MAX_LABEL_WIDTH): string {
  return label.length <= width ? label : `${label.slice(0, width - 1)}…`;
}

function formatNumber(value: number): string {
  return value.toLocaleString("en-US");
}

function barRows(
  rows: ReadonlyArray<{ label: string; count: number }>,
  options: RenderOptions
): string[] {
  const labelWidth = options.labelWidth ?? MAX_LABEL_WIDTH;
  const labels = rows.map((row) => truncateLabel(row.label, labelWidth));
  const pad = Math.max(0, ...labels.map((label) => label.length));
  const max = Math.max(0, ...rows.map((row) => row.count));
  return rows.map(
    (row, index) =>
      `  ${(labels[index] ?? "").padEnd(pad)}  ${formatBar(row.count, max, options.barWidth)} ${formatNumber(row.count)}`
  );
}

/**
 * Render a report as plain text lines.
 */
export function renderTextReport(report: AnalysisReport, options: RenderOptions): string {
  const c = (color: Color, text: string): string =>
    options.color ? `${COLORS[color]}${text}${COLORS.reset}` : text;
  const heading = (title: string): string => `\n${c("bold", title)}\n${"─".repeat(60)}`;
  const warn = (text: string): string => `  ${c("yellow", "!")} ${text}`;

  const lines: string[] = [];
  lines.push(c("bold", "═".repeat(60)));
  lines.push(c("bold", " Paper Metadata Explorer"));
  lines.push(c("bold", "═".repeat(60)));

  // Overview
  const { overview } = report;
  lines.push(heading("Dataset Overview"));
  lines.push(`  Total papers:    ${formatNumber(overview.totalRecords)}`);
  lines.push(`  Total columns:   ${overview.totalColumns}`);
  lines.push(
    `  Unique journals: ${overview.uniqueJournals === null ? "N/A" : formatNumber(overview.uniqueJournals)}`
  );

  // Missing data
  const missingRows = (entries: AnalysisReport["missing"]): string[] =>
    entries.length === 0
      ? [`  ${c("green", "✓")} No missing data found`]
      : barRows(entries.map(({ column, missing }) => ({ label: column, count: missing })), options);
  lines.push(heading("Missing Data (before imputation)"));
  lines.push(...missingRows(report.missing));
  lines.push(heading("Missing Data (after imputation)"));
  lines.push(...missingRows(report.missingAfterImputation));

  // Timeline
  const { timeline } = report;
  lines.push(heading(`Publications Over Time (${timeline.range.min}-${timeline.range.max})`));
  if (timeline.status === "missing-column") {
    lines.push(warn("Publication time column not found in dataset."));
  } else if (timeline.status === "empty") {
    lines.push(
      warn(
        timeline.datedRecords === 0
          ? "No valid date data available for analysis."
          : "No data available for the selected year range."
      )
    );
  } else {
    lines.push(
      ...barRows([...timeline.counts].map(([year, count]) => ({ label: String(year), count })), options)
    );
  }

  // Journals
  const { journals } = report;
  lines.push(heading(`Top ${journals.topN} Journals`));
  if (journals.status === "missing-column") {
    lines.push(warn("Journal column not found in dataset."));
  } else if (journals.status === "empty") {
    lines.push(warn("No valid journal data available."));
  } else {
    lines.push(...barRows(journals.entries, options));
  }

  // Sources
  const { sources } = report;
  lines.push(heading(`Papers by Source${sources.field === null ? "" : ` (${sources.field})`}`));
  if (sources.status === "missing-column") {
    lines.push(warn("No source column found in the dataset."));
  } else if (sources.status === "empty") {
    lines.push(warn("No source data available."));
  } else {
    lines.push(...barRows(sources.entries, options));
  }

  // Words
  const { words } = report;
  lines.push(heading("Most Frequent Words in Titles"));
  if (words.status === "missing-column") {
    lines.push(warn("Title column not found in dataset."));
  } else if (words.status === "empty") {
    lines.push(warn("No valid words found for analysis."));
  } else {
    lines.push(...barRows(words.table.map(({ word, count }) => ({ label: word, count })), options));
    lines.push(heading("Word Cloud Weights"));
    lines.push(
      `  ${words.cloud.map(({ word, weight }) => `${word} ${c("dim", weight.toFixed(2))}`).join(", ")}`
    );
  }

  // Sample
  const { sample } = report;
  lines.push(heading(`Sample Data (${sample.rows.length} rows)`));
  if (sample.status === "missing-column") {
    lines.push(warn("No common columns found to display."));
  } else {
    sample.rows.forEach((row, index) => {
      lines.push(`  ${c("cyan", `#${index + 1}`)}`);
      for (const column of sample.columns) {
        const value = row[column];
        if (value === undefined) continue;
        const text = value instanceof Date ? value.toISOString().slice(0, 10) : String(value);
        lines.push(`    ${column}: ${truncateLabel(text, 80)}`);
      }
    });
  }

  return lines.join("\n");
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();
  initRunId();

  const appConfig = loadAppConfig();
  const logger = createLogger({
    level: args.verbose ? "debug" : appConfig.logLevel,
    file: appConfig.logToFile,
    context: { app: appConfig.appName },
  });

  const analysisConfig =
    args.config !== undefined
      ? loadAnalysisConfigFile(args.config)
      : loadAnalysisConfig(DEFAULT_ANALYSIS_CONFIG);

  const dataPath = args.data ?? appConfig.dataPath;
  const maxRows = parseIntOption("rows", args.rows) ?? appConfig.maxRows;

  const cache = new DatasetCache((text, filePath) => parseCsvDataset(text, { maxRows }, filePath));
  logger.info("Loading data", { dataPath, maxRows });
  const raw = cache.get(dataPath);

  if (raw.length === 0) {
    logger.error("No data loaded; check that the CSV has rows", { dataPath });
    process.exit(1);
  }
  logger.info("Data loaded", { records: raw.length });
  logger.debug("Dataset cache", { ...cache.stats() });

  const report = analyzeDataset(raw, analysisConfig, {
    yearRange: {
      min: parseIntOption("from", args.from),
      max: parseIntOption("to", args.to),
    },
    topN: parseIntOption("top", args.top),
    sampleSize: parseIntOption("sample", args.sample),
    logger,
  });

  if (args.json) {
    console.log(serializeReport(report));
  } else {
    const color = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;
    console.log(renderTextReport(report, { color }));
  }
}

function describeError(err: unknown): string {
  if (err instanceof AnalysisConfigError) return err.format();
  if (
    err instanceof ConfigError ||
    err instanceof DatasetLoadError ||
    err instanceof InvalidArgumentError
  ) {
    return err.message;
  }
  return `Unexpected error: ${err instanceof Error ? err.message : String(err)}`;
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("explore.ts") ||
   process.argv[1].endsWith("explore.js") ||
   process.argv[1].endsWith("paper-explorer"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error(describeError(err));
    process.exit(1);
  });
}
