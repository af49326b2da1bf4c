/**
 * Word frequencies over a free-text column.
 *
 * Tokenization:
 *   1. Join the string values of the column with spaces. Non-string and
 *      missing values contribute nothing.
 *   2. Lowercase.
 *   3. Split into maximal runs of letters, digits and underscores.
 *   4. Keep runs made only of letters, at least minLength characters long.
 *      "COVID-19" yields "covid"; "covid19" and "19" yield nothing.
 *   5. Drop stop words.
 *
 * The frequency map is never truncated; topWords and cloudWeights derive
 * the ranked table and the cloud from it.
 */

import { readField } from "../dataset/schema-probe.js";
import { requireNonNegativeInteger, requirePositiveInteger } from "../dataset/errors.js";
import type { Dataset, WordFrequency } from "../dataset/types.js";

const TOKEN_RUN = /[\p{L}\p{N}_]+/gu;
const LETTERS_ONLY = /^\p{L}+$/u;

export interface RankedWord {
  readonly word: string;
  readonly count: number;
}

export interface CloudWord extends RankedWord {
  /** count relative to the most frequent word, in (0, 1] */
  readonly weight: number;
}

/**
 * Split text into lowercase letter-only tokens of at least minLength
 * characters, in order of appearance.
 *
 * @throws InvalidArgumentError if minLength is not a positive integer
 */
export function tokenize(text: string, minLength: number): string[] {
  requirePositiveInteger("minLength", minLength);

  const tokens: string[] = [];
  for (const [run] of text.toLowerCase().matchAll(TOKEN_RUN)) {
    if (LETTERS_ONLY.test(run) && [...run].length >= minLength) {
      tokens.push(run);
    }
  }
  return tokens;
}

/**
 * Concatenate the string values of a column.
 */
export function collectText(dataset: Dataset, textField: string): string {
  const parts: string[] = [];
  for (const record of dataset) {
    const value = readField(record, textField);
    if (typeof value === "string") {
      parts.push(value);
    }
  }
  return parts.join(" ");
}

/**
 * Count tokens of a text column, stop words excluded.
 *
 * Stop words are compared lowercased. An absent column, empty text, or text
 * made only of stop words gives an empty map.
 *
 * @throws InvalidArgumentError if minLength is not a positive integer
 */
export function wordFrequencies(
  dataset: Dataset,
  textField: string,
  stopWords: Iterable<string>,
  minLength: number
): WordFrequency {
  requirePositiveInteger("minLength", minLength);

  const excluded = new Set<string>();
  for (const word of stopWords) {
    excluded.add(word.toLowerCase());
  }

  const counts = new Map<string, number>();
  for (const token of tokenize(collectText(dataset, textField), minLength)) {
    if (excluded.has(token)) continue;
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * The k most frequent words; ties keep first-occurrence order.
 *
 * @throws InvalidArgumentError if k is negative or not an integer
 */
export function topWords(frequencies: WordFrequency, k: number): RankedWord[] {
  requireNonNegativeInteger("k", k);
  return [...frequencies]
    .map(([word, count]) => ({ word, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, k);
}

/**
 * Cloud layout input: the maxWords most frequent words, each weighted by
 * its count divided by the highest count.
 *
 * @throws InvalidArgumentError if maxWords is negative or not an integer
 */
export function cloudWeights(frequencies: WordFrequency, maxWords: number): CloudWord[] {
  const ranked = topWords(frequencies, maxWords);
  const highest = ranked[0]?.count ?? 0;
  return ranked.map(({ word, count }) => ({ word, count, weight: count / highest }));
}
