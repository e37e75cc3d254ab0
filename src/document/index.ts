/**
 * Document model, marker segmentation and run-preserving rewriting.
 */

export {
  FORMATTING_KEYS,
  paragraphText,
  documentText,
  sameFormatting,
  type Formatting,
  type Run,
  type Paragraph,
  type Document,
  type Region,
} from "./types.js";

export {
  parseRegions,
  markerToken,
  regionOf,
  type MarkerToken,
  type MarkerParseResult,
  type RemovedMarker,
  type StructuralWarning,
  type StructuralWarningCode,
} from "./markers.js";

export {
  rewriteParagraph,
  normalizeRuns,
  orderEdits,
  applyEditsToText,
  ConflictingMatchesError,
  InvariantViolationError,
  type TextEdit,
  type ParagraphRewriter,
} from "./rewriter.js";

export {
  DocumentSchema,
  FormattingSchema,
  parseDocument,
  readDocumentFile,
  serializeDocument,
  DocumentFormatError,
  type DocumentInput,
  type DocumentIssue,
} from "./schema.js";
