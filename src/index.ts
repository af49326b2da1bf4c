/**
 * Paper metadata explorer: imputation, aggregation and word-frequency
 * pipeline for research-paper metadata.
 *
 * @example
 *   import {
 *     loadCsvDataset,
 *     impute,
 *     PAPER_METADATA_DEFAULTS,
 *     countByYear,
 *     topCategories,
 *     wordFrequencies,
 *     DEFAULT_STOP_WORDS,
 *   } from "paper-explorer";
 *
 *   const dataset = impute(loadCsvDataset("metadata.csv"), PAPER_METADATA_DEFAULTS);
 *   const perYear = countByYear(dataset, "publish_time", { min: 2019, max: 2022 });
 *   const journals = topCategories(dataset, "journal", ["Unknown Journal"], 10);
 *   const words = wordFrequencies(dataset, "title", DEFAULT_STOP_WORDS, 3);
 */

export * from "./dataset/index.js";
export * from "./imputer/index.js";
export * from "./aggregators/index.js";
export * from "./analysis/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
