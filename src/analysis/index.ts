/**
 * Full analysis pipeline and its report.
 */

export {
  analyzeDataset,
  type AnalysisReport,
  type AnalyzeOptions,
  type SectionStatus,
  type TimelineSection,
  type RankingSection,
  type WordsSection,
  type SampleSection,
} from "./pipeline.js";

export {
  summarizeDataset,
  missingValueReport,
  sampleRecords,
  type DatasetOverview,
  type MissingValueEntry,
  type DatasetSample,
} from "./overview.js";

export { serializeReport, toSerializable, type SerializedReport } from "./serialization.js";
