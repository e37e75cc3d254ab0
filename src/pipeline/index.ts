export { processDocument, remapSpan, type ProcessOptions } from "./process.js";
export { summarizeChanges } from "./changes.js";
export {
  processBatch,
  type BatchItem,
  type BatchItemResult,
  type BatchResult,
  type BatchOptions,
} from "./batch.js";
export type {
  ChangeLogEntry,
  ReplacementEntry,
  MarkerRemovedEntry,
  PipelineIssue,
  ConflictingMatchesIssue,
  InvariantViolationIssue,
  ResidualFinding,
  CorrectionSummary,
  DocumentReport,
  ProcessResult,
} from "./types.js";
