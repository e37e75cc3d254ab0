/**
 * Document pipeline.
 *
 *   parseRegions → category passes in fixed order → residual scan → analysis
 *
 * Each category pass walks the regions in its scope. Within a region the
 * category's candidates are collected for every paragraph first; if any two
 * of them overlap, the whole region is skipped for that category and a
 * conflict is reported. Otherwise each paragraph is rewritten and the spans
 * the category touched (claims included) are committed. Later categories
 * never rewrite inside a committed span.
 *
 * Failures are scoped: a conflict skips one region for one category, an
 * invariant violation restores one paragraph and takes it out of every
 * later pass. Structural problems with markers are reported and recovered.
 */

import type { RegionKind, RuleCategory } from "../config/standards/enums.js";
import type { StandardsConfig } from "../config/standards/schema.js";
import { parseRegions, regionOf } from "../document/markers.js";
import {
  applyEditsToText,
  ConflictingMatchesError,
  InvariantViolationError,
  rewriteParagraph,
  type ParagraphRewriter,
} from "../document/rewriter.js";
import { paragraphText, type Document, type Paragraph, type Region } from "../document/types.js";
import { analyzeDocument } from "../analysis/analyzer.js";
import { compareToTargets } from "../analysis/targets.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import { isExcluded, protectedSpans, type Span } from "../rules/exclusions.js";
import { findCandidates } from "../rules/match.js";
import type { RuleSet } from "../rules/ruleset.js";
import { isClaim, ruleId, type Candidate, type Rule, type RuleContext } from "../rules/types.js";
import type {
  ChangeLogEntry,
  PipelineIssue,
  ProcessResult,
  ReplacementEntry,
  ResidualFinding,
} from "./types.js";

export interface ProcessOptions {
  /** Receives per-document progress; silent by default */
  logger?: Logger;
  /** Replaces the run-preserving rewriter (tests) */
  rewriter?: ParagraphRewriter;
}

interface ParagraphState {
  /** Paragraph as it entered the pipeline, after marker stripping */
  readonly original: Paragraph;
  current: Paragraph;
  text: string;
  /** Committed spans in current-text coordinates */
  committed: Span[];
  /** Restored after an invariant violation; skipped from then on */
  quarantined: boolean;
}

interface PassContext {
  readonly ruleSet: RuleSet;
  readonly states: ParagraphState[];
  /** Region kind of each paragraph */
  readonly regionKinds: readonly RegionKind[];
  readonly changes: ChangeLogEntry[];
  readonly issues: PipelineIssue[];
  readonly rewrite: ParagraphRewriter;
  readonly logger: Logger;
}

function containedIn(spans: readonly Span[], candidate: Span): boolean {
  return spans.some((span) => span.start <= candidate.start && candidate.end <= span.end);
}

/**
 * Candidates of `rules` for one paragraph, minus excluded ones and ones
 * inside a committed span.
 */
function collectCandidates(
  rules: readonly Rule[],
  state: ParagraphState,
  context: RuleContext,
  ruleSet: RuleSet
): Candidate[] {
  const spans = protectedSpans(ruleSet.exclusions, state.text);
  return rules
    .flatMap((rule) => findCandidates(rule, context))
    .filter((candidate) => !isExcluded(ruleSet.exclusions, state.text, candidate, candidate.rule.exclusionPolicy, spans))
    .filter((candidate) => !containedIn(state.committed, candidate))
    .sort((a, b) => a.start - b.start || a.end - b.end);
}

function findOverlap(candidates: readonly Candidate[]): [Candidate, Candidate] | null {
  let widest: Candidate | null = null;
  for (const candidate of candidates) {
    if (widest && candidate.start < widest.end) {
      return [widest, candidate];
    }
    if (!widest || candidate.end > widest.end) {
      widest = candidate;
    }
  }
  return null;
}

/**
 * Carry a span through a set of disjoint edits. An edit touching the span
 * widens it to cover the edit's replacement.
 */
export function remapSpan(span: Span, edits: readonly Candidate[]): Span {
  let { start, end } = span;
  for (let i = edits.length - 1; i >= 0; i--) {
    const edit = edits[i];
    const delta = edit.replacement.length - (edit.end - edit.start);
    if (edit.start >= end) {
      continue;
    }
    if (edit.end <= start) {
      start += delta;
      end += delta;
      continue;
    }
    start = Math.min(start, edit.start);
    end = Math.max(end, edit.end) + delta;
  }
  return { start, end };
}

function rollback(pass: PassContext, paragraphIndex: number, category: RuleCategory, message: string): void {
  const state = pass.states[paragraphIndex];
  state.current = state.original;
  state.text = paragraphText(state.original);
  state.committed = [];
  state.quarantined = true;

  for (let i = pass.changes.length - 1; i >= 0; i--) {
    const entry = pass.changes[i];
    if (entry.kind === "replacement" && entry.paragraphIndex === paragraphIndex) {
      pass.changes.splice(i, 1);
    }
  }

  pass.issues.push({ kind: "invariant_violation", category, paragraphIndex, message });
  pass.logger.error("Paragraph restored after invariant violation", { category, paragraphIndex, message });
}

function applyCandidates(
  pass: PassContext,
  paragraphIndex: number,
  regionKind: RegionKind,
  category: RuleCategory,
  candidates: readonly Candidate[]
): void {
  const state = pass.states[paragraphIndex];
  const writes = candidates.filter((candidate) => !isClaim(candidate));

  let next = state.current;
  if (writes.length > 0) {
    try {
      next = pass.rewrite(state.current, writes);
    } catch (err) {
      if (err instanceof InvariantViolationError) {
        rollback(pass, paragraphIndex, category, err.message);
        return;
      }
      if (err instanceof ConflictingMatchesError) {
        const owner = (edit: Span) =>
          writes.find((write) => write.start === edit.start && write.end === edit.end);
        const first = owner(err.first);
        const second = owner(err.second);
        pass.issues.push({
          kind: "conflicting_matches",
          category,
          regionKind,
          paragraphIndex,
          rules: [first ? ruleId(first.rule) : category, second ? ruleId(second.rule) : category],
          message: err.message,
        });
        pass.logger.warn("Conflicting matches", { category, region: regionKind, paragraphIndex });
        return;
      }
      throw err;
    }

    const expected = applyEditsToText(state.text, writes);
    const actual = paragraphText(next);
    if (actual !== expected) {
      rollback(pass, paragraphIndex, category, new InvariantViolationError(expected, actual).message);
      return;
    }
  }

  const remapped = state.committed.map((span) => remapSpan(span, writes));
  let shift = 0;
  for (const candidate of candidates) {
    const start = candidate.start + shift;
    remapped.push({ start, end: start + candidate.replacement.length });
    shift += candidate.replacement.length - candidate.original.length;
  }

  for (const write of writes) {
    const entry: ReplacementEntry = {
      kind: "replacement",
      category,
      rule: ruleId(write.rule),
      paragraphIndex,
      regionKind,
      start: write.start,
      end: write.end,
      before: write.original,
      after: write.replacement,
    };
    pass.changes.push(entry);
    pass.logger.debug("Replacement", { ...entry });
  }

  state.current = next;
  state.text = paragraphText(next);
  state.committed = remapped;
}

function runRegionPass(
  pass: PassContext,
  region: Region,
  category: RuleCategory,
  rules: readonly Rule[]
): void {
  const paragraphs = pass.states.map((state) => state.text);
  const planned: { paragraphIndex: number; candidates: Candidate[] }[] = [];

  for (let index = region.start; index < region.end; index++) {
    const state = pass.states[index];
    if (state.quarantined) {
      continue;
    }
    const context: RuleContext = {
      text: state.text,
      paragraphIndex: index,
      regionKind: region.kind,
      paragraphs,
      paragraphRegions: pass.regionKinds,
    };
    const candidates = collectCandidates(rules, state, context, pass.ruleSet);

    const overlap = findOverlap(candidates);
    if (overlap) {
      const [first, second] = overlap;
      const message =
        `${ruleId(first.rule)} [${first.start}, ${first.end}) overlaps ` +
        `${ruleId(second.rule)} [${second.start}, ${second.end}) in paragraph ${index}; ` +
        `${category} skipped for the ${region.kind} region`;
      pass.issues.push({
        kind: "conflicting_matches",
        category,
        regionKind: region.kind,
        paragraphIndex: index,
        rules: [ruleId(first.rule), ruleId(second.rule)],
        message,
      });
      pass.logger.warn("Conflicting matches", { category, region: region.kind, paragraphIndex: index });
      return;
    }
    if (candidates.length > 0) {
      planned.push({ paragraphIndex: index, candidates });
    }
  }

  for (const { paragraphIndex, candidates } of planned) {
    applyCandidates(pass, paragraphIndex, region.kind, category, candidates);
  }
}

function scopedRules(rules: readonly Rule[], kind: RegionKind): Rule[] {
  return rules.filter((rule) => rule.scope.includes(kind));
}

/**
 * Re-run every enabled category over the final text and report what would
 * still change.
 */
function scanResiduals(
  pass: PassContext,
  regions: readonly Region[],
  config: StandardsConfig
): ResidualFinding[] {
  const findings: ResidualFinding[] = [];
  const paragraphs = pass.states.map((state) => state.text);

  for (const { category, rules } of pass.ruleSet.categories) {
    const settings = config.categories[category];
    if (!settings.enabled) {
      continue;
    }
    for (const region of regions) {
      if (!settings.appliesTo.includes(region.kind)) {
        continue;
      }
      const applicable = scopedRules(rules, region.kind);
      for (let index = region.start; index < region.end; index++) {
        const state = pass.states[index];
        if (state.quarantined || applicable.length === 0) {
          continue;
        }
        const context: RuleContext = {
          text: state.text,
          paragraphIndex: index,
          regionKind: region.kind,
          paragraphs,
          paragraphRegions: pass.regionKinds,
        };
        for (const candidate of collectCandidates(applicable, state, context, pass.ruleSet)) {
          if (isClaim(candidate)) {
            continue;
          }
          findings.push({
            category,
            rule: ruleId(candidate.rule),
            paragraphIndex: index,
            start: candidate.start,
            end: candidate.end,
            text: candidate.original,
            suggestion: candidate.replacement,
          });
        }
      }
    }
  }

  return findings;
}

/**
 * Normalize one document.
 */
export function processDocument(
  document: Document,
  ruleSet: RuleSet,
  config: StandardsConfig,
  options: ProcessOptions = {}
): ProcessResult {
  const logger = options.logger ?? silentLogger;
  const parsed = parseRegions(document);

  const changes: ChangeLogEntry[] = parsed.markers.map((marker) => ({
    kind: "marker_removed",
    token: marker.token,
    paragraphIndex: marker.paragraphIndex,
  }));
  const issues: PipelineIssue[] = [...parsed.warnings];
  for (const warning of parsed.warnings) {
    logger.warn(warning.message, { code: warning.code, paragraphIndex: warning.paragraphIndex });
  }

  const pass: PassContext = {
    ruleSet,
    states: parsed.document.paragraphs.map((paragraph) => ({
      original: paragraph,
      current: paragraph,
      text: paragraphText(paragraph),
      committed: [],
      quarantined: false,
    })),
    regionKinds: parsed.document.paragraphs.map((_, index) => regionOf(parsed.regions, index)?.kind ?? "unmarked"),
    changes,
    issues,
    rewrite: options.rewriter ?? rewriteParagraph,
    logger,
  };

  let residuals: ResidualFinding[] = [];

  for (const { category, rules } of ruleSet.categories) {
    const settings = config.categories[category];
    if (!settings.enabled) {
      logger.debug("Category disabled", { category });
      continue;
    }

    const before = changes.length;
    for (const region of parsed.regions) {
      if (!settings.appliesTo.includes(region.kind)) {
        continue;
      }
      const applicable = scopedRules(rules, region.kind);
      if (applicable.length > 0) {
        runRegionPass(pass, region, category, applicable);
      }
    }
    logger.debug("Category applied", { category, replacements: Math.max(0, changes.length - before) });

    if (category === "final_validation") {
      residuals = scanResiduals(pass, parsed.regions, config);
      for (const finding of residuals) {
        logger.warn("Residual finding", { ...finding });
      }
    }
  }

  const output: Document = { ...parsed.document, paragraphs: pass.states.map((state) => state.current) };
  const analysis = analyzeDocument(output, { keywords: config.targets.keywords });

  logger.info("Document processed", {
    paragraphs: output.paragraphs.length,
    regions: parsed.regions.length,
    replacements: changes.filter((entry) => entry.kind === "replacement").length,
    issues: issues.length,
    residuals: residuals.length,
  });

  return {
    document: output,
    regions: parsed.regions,
    changes,
    issues,
    residuals,
    report: {
      analysis,
      targets: compareToTargets(analysis, config.targets),
    },
  };
}
