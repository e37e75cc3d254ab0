/**
 * Rule definitions.
 *
 * A rule is plain data: a tagged variant holding either a literal lookup
 * table or a pattern with a pure replace function. Rules are held in an
 * ordered list per category; a rule's priority is its position in that
 * list. There is no rule class hierarchy and no rule keeps state between
 * calls.
 */

import type { ExclusionPolicy, RegionKind, RuleCategory } from "../config/standards/enums.js";

/**
 * What a rule may look at besides its own match.
 */
export interface RuleContext {
  /** Current text of the paragraph being matched */
  readonly text: string;
  /** Index of the paragraph in the (marker-stripped) document */
  readonly paragraphIndex: number;
  /** Kind of region the paragraph belongs to */
  readonly regionKind: RegionKind;
  /** Current text of every paragraph of the document, in order */
  readonly paragraphs: readonly string[];
  /** Region kind of every paragraph, parallel to `paragraphs` */
  readonly paragraphRegions: readonly RegionKind[];
}

interface RuleBase {
  readonly category: RuleCategory;
  /** Unique within the category */
  readonly name: string;
  readonly description: string;
  /** Region kinds this rule may rewrite */
  readonly scope: readonly RegionKind[];
  readonly exclusionPolicy: ExclusionPolicy;
}

/**
 * Literal substitution table, matched on word boundaries.
 */
export interface LookupRule extends RuleBase {
  readonly kind: "lookup";
  readonly entries: readonly { readonly from: string; readonly to: string }[];
  readonly caseInsensitive: boolean;
  /** Carry the original's leading capital (or all-caps) over to the replacement */
  readonly preserveCapitalization: boolean;
}

/**
 * Pattern rule. `replace` returns the replacement for a match, or null when
 * the match should be ignored. Returning the matched text unchanged claims
 * the span without rewriting it.
 */
export interface PatternRule extends RuleBase {
  readonly kind: "pattern";
  readonly pattern: RegExp;
  readonly replace: (match: RegExpExecArray, context: RuleContext) => string | null;
}

export type Rule = LookupRule | PatternRule;

/**
 * Candidate replacement produced by a rule, before exclusion and conflict
 * handling.
 */
export interface Candidate {
  readonly rule: Rule;
  readonly start: number;
  readonly end: number;
  readonly original: string;
  readonly replacement: string;
}

export function ruleId(rule: Pick<Rule, "category" | "name">): string {
  return `${rule.category}/${rule.name}`;
}

/** A candidate that leaves the text as it is. */
export function isClaim(candidate: Pick<Candidate, "original" | "replacement">): boolean {
  return candidate.original === candidate.replacement;
}
