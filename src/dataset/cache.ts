/**
 * Caller-owned dataset cache.
 *
 * Loading and imputing a large metadata file is the slowest step of a run,
 * so callers that analyze the same file repeatedly can hold a DatasetCache.
 * Entries are keyed by absolute path and stamped with a SHA-256 fingerprint
 * of the file content. A lookup re-reads the file, and a fingerprint
 * mismatch discards the stale entry and rebuilds it.
 *
 * USAGE:
 *
 *   const cache = new DatasetCache((text) => impute(parseCsvDataset(text), table));
 *
 *   const first = cache.get("metadata.csv");   // parsed and imputed
 *   const again = cache.get("metadata.csv");   // same instance, file unchanged
 *
 *   cache.invalidate("metadata.csv");           // force a rebuild on next get
 */

import { createHash } from "node:crypto";
import { resolve } from "node:path";

import { readCsvText } from "./loader.js";
import type { Dataset } from "./types.js";

/** Builds a dataset from raw file text. */
export type DatasetBuilder = (text: string, filePath: string) => Dataset;

export interface CacheEntry {
  readonly fingerprint: string;
  readonly dataset: Dataset;
}

export function fingerprint(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

export class DatasetCache {
  private readonly entries = new Map<string, CacheEntry>();
  private hitCount = 0;
  private missCount = 0;

  constructor(private readonly build: DatasetBuilder) {}

  /**
   * Return the dataset for a file, rebuilding it when the content changed.
   *
   * @throws DatasetLoadError if the file cannot be read
   */
  get(filePath: string): Dataset {
    const key = resolve(filePath);
    const text = readCsvText(key);
    const stamp = fingerprint(text);

    const cached = this.entries.get(key);
    if (cached && cached.fingerprint === stamp) {
      this.hitCount++;
      return cached.dataset;
    }

    this.missCount++;
    const dataset = this.build(text, key);
    this.entries.set(key, { fingerprint: stamp, dataset });
    return dataset;
  }

  /**
   * Drop the entry for one file. Returns true if an entry existed.
   */
  invalidate(filePath: string): boolean {
    return this.entries.delete(resolve(filePath));
  }

  clear(): void {
    this.entries.clear();
  }

  has(filePath: string): boolean {
    return this.entries.has(resolve(filePath));
  }

  stats(): { entries: number; hits: number; misses: number } {
    return { entries: this.entries.size, hits: this.hitCount, misses: this.missCount };
  }
}
