/**
 * Plain-text rendering of an analysis report.
 */

import type { Document, Paragraph } from "../document/types.js";
import type { CorrectionSummary } from "../pipeline/types.js";
import type { AnalysisReport, TargetComparison } from "./types.js";

/**
 * Render the report. The corrections section is printed only when a
 * correction summary is given, even an empty one.
 */
export function formatSummary(
  report: AnalysisReport,
  comparison: TargetComparison = {},
  corrections?: CorrectionSummary
): string {
  const lines: string[] = [];

  lines.push("DOCUMENT ANALYSIS");
  lines.push("=".repeat(50));
  lines.push("");

  lines.push("Basic Statistics:");
  lines.push(`  Word Count: ${report.wordCount}`);
  lines.push(`  Sentence Count: ${report.sentenceCount}`);
  lines.push(`  Reading Level: ${report.readingLevel.toFixed(1)} grade`);
  lines.push(`  Reading Ease: ${report.readingEase.toFixed(1)}`);
  lines.push(`  Avg Sentence Length: ${report.averageSentenceLength.toFixed(1)} words`);
  lines.push("");

  if (comparison.wordCount || comparison.readingLevel) {
    lines.push("Target Comparison:");
    if (comparison.wordCount) {
      const { actual, target, status } = comparison.wordCount;
      lines.push(`  Word Count: ${actual} (target: ${target}, ${status})`);
    }
    if (comparison.readingLevel) {
      const { actual, target, status } = comparison.readingLevel;
      lines.push(`  Reading Level: ${actual.toFixed(1)} (target: ${target.toFixed(1)}, ${status})`);
    }
    lines.push("");
  }

  if (report.keywords.length > 0) {
    lines.push("Keyword Analysis:");
    for (const stat of report.keywords) {
      lines.push(`  '${stat.keyword}': ${stat.count} times (${stat.density.toFixed(2)}% density)`);
    }
    lines.push("");
  }

  if (report.topWords.length > 0) {
    lines.push("Top Words:");
    for (const entry of report.topWords) {
      lines.push(`  ${entry.word}: ${entry.count}`);
    }
    lines.push("");
  }

  if (corrections) {
    lines.push(`Corrections Applied: ${corrections.total}`);
    for (const { category, count } of corrections.byCategory) {
      lines.push(`  ${category}: ${count}`);
    }
    lines.push("");
  }

  return lines.join("\n");
}

export const REPORT_HEADING = "Document Analysis Report";

/**
 * Append a rendered summary to a document: a bold heading paragraph, then
 * one "Normal" paragraph per non-blank line, trimmed.
 */
export function appendAnalysisSection(document: Document, summary: string): Document {
  const heading: Paragraph = {
    runs: [{ text: REPORT_HEADING, formatting: { bold: true, fontSize: 16, color: "003366" } }],
  };
  const body = summary
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line): Paragraph => ({ style: "Normal", runs: [{ text: line, formatting: {} }] }));

  return { ...document, paragraphs: [...document.paragraphs, heading, ...body] };
}
