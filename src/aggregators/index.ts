/**
 * Aggregators over an imputed dataset. Each takes a read-only dataset and
 * returns a freshly allocated result.
 */

export {
  countByYear,
  countAllYears,
  filterYearRange,
  totalCount,
  deriveYearRange,
  resolveYearRange,
} from "./temporal.js";

export {
  topCategories,
  countCategories,
  countDistinct,
  findSourceColumn,
} from "./categorical.js";

export {
  wordFrequencies,
  tokenize,
  collectText,
  topWords,
  cloudWeights,
  type RankedWord,
  type CloudWord,
} from "./text-frequency.js";
