/**
 * Comparison of analyzer metrics against configured targets.
 */

import type { Targets } from "../config/standards/schema.js";
import type { AnalysisReport, TargetComparison } from "./types.js";

export function compareToTargets(
  report: Pick<AnalysisReport, "wordCount" | "readingLevel">,
  targets: Pick<Targets, "wordCount" | "readingLevel">
): TargetComparison {
  const comparison: {
    -readonly [K in keyof TargetComparison]: TargetComparison[K];
  } = {};

  if (targets.wordCount) {
    const { target, tolerance } = targets.wordCount;
    const difference = report.wordCount - target;
    comparison.wordCount = {
      target,
      actual: report.wordCount,
      difference,
      status: Math.abs(difference) <= tolerance ? "on_target" : difference > 0 ? "over" : "under",
    };
  }

  if (targets.readingLevel) {
    const { target, tolerance } = targets.readingLevel;
    const difference = Math.round((report.readingLevel - target) * 10) / 10;
    comparison.readingLevel = {
      target,
      actual: report.readingLevel,
      difference,
      status: Math.abs(difference) <= tolerance ? "on_target" : difference > 0 ? "above" : "below",
    };
  }

  return comparison;
}
