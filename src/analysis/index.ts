export {
  analyzeText,
  analyzeDocument,
  tokenizeWords,
  splitSentences,
  countSyllables,
} from "./analyzer.js";
export { compareToTargets } from "./targets.js";
export { formatSummary, appendAnalysisSection, REPORT_HEADING } from "./summary.js";
export type {
  AnalysisReport,
  AnalyzeOptions,
  KeywordStat,
  WordFrequency,
  TargetComparison,
  WordCountStatus,
  ReadingLevelStatus,
} from "./types.js";
