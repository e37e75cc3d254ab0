/**
 * Pipeline result types.
 */

import type { RegionKind, RuleCategory } from "../config/standards/enums.js";
import type { Document, Region } from "../document/types.js";
import type { MarkerToken, StructuralWarning } from "../document/markers.js";
import type { AnalysisReport, TargetComparison } from "../analysis/types.js";

/**
 * A text replacement written to the document. Offsets refer to the
 * paragraph text as it was when the category ran.
 */
export interface ReplacementEntry {
  readonly kind: "replacement";
  readonly category: RuleCategory;
  /** Rule identity, "category/name" */
  readonly rule: string;
  /** Index in the output document */
  readonly paragraphIndex: number;
  readonly regionKind: RegionKind;
  readonly start: number;
  readonly end: number;
  readonly before: string;
  readonly after: string;
}

export interface MarkerRemovedEntry {
  readonly kind: "marker_removed";
  readonly token: MarkerToken;
  /** Index in the input document */
  readonly paragraphIndex: number;
}

export type ChangeLogEntry = ReplacementEntry | MarkerRemovedEntry;

export interface ConflictingMatchesIssue {
  readonly kind: "conflicting_matches";
  readonly category: RuleCategory;
  readonly regionKind: RegionKind;
  readonly paragraphIndex: number;
  /** The two overlapping rules */
  readonly rules: readonly [string, string];
  readonly message: string;
}

export interface InvariantViolationIssue {
  readonly kind: "invariant_violation";
  readonly category: RuleCategory;
  readonly paragraphIndex: number;
  readonly message: string;
}

export type PipelineIssue = StructuralWarning | ConflictingMatchesIssue | InvariantViolationIssue;

/**
 * A candidate that would still change the final text.
 */
export interface ResidualFinding {
  readonly category: RuleCategory;
  readonly rule: string;
  readonly paragraphIndex: number;
  readonly start: number;
  readonly end: number;
  readonly text: string;
  readonly suggestion: string;
}

/**
 * Replacements per category, in application order. Categories that made
 * no replacement are left out.
 */
export interface CorrectionSummary {
  readonly total: number;
  readonly byCategory: readonly { readonly category: RuleCategory; readonly count: number }[];
}

export interface DocumentReport {
  readonly analysis: AnalysisReport;
  readonly targets: TargetComparison;
}

export interface ProcessResult {
  readonly document: Document;
  readonly regions: readonly Region[];
  readonly changes: readonly ChangeLogEntry[];
  readonly issues: readonly PipelineIssue[];
  readonly residuals: readonly ResidualFinding[];
  readonly report: DocumentReport;
}
