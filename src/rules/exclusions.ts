/**
 * Exclusion set: terms and spans no rule may alter.
 *
 * Literal entries are matched case-sensitively, exactly as written. Pattern
 * entries are regular expressions. With markup protection on, URLs,
 * [bracketed] and <angled> spans are protected the same way.
 */

import type { ExclusionPolicy } from "../config/standards/enums.js";
import type { StandardsConfig } from "../config/standards/schema.js";

export interface ExclusionSet {
  readonly literals: readonly string[];
  readonly patterns: readonly RegExp[];
  readonly protectMarkup: boolean;
}

export interface Span {
  readonly start: number;
  readonly end: number;
}

const MARKUP_PATTERNS: readonly RegExp[] = [
  /(?:https?:\/\/|www\.)\S+/gi,
  /\[[^\]\n]+\]/g,
  /<[^>\n]+>/g,
];

export function createExclusionSet(
  config: Pick<StandardsConfig, "exclusions" | "exclusionPatterns" | "protectMarkup">
): ExclusionSet {
  return Object.freeze({
    literals: Object.freeze([...new Set(config.exclusions)]),
    patterns: Object.freeze(config.exclusionPatterns.map((source) => new RegExp(source, "g"))),
    protectMarkup: config.protectMarkup,
  });
}

function occurrences(pattern: RegExp, text: string): Span[] {
  const regex = new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : pattern.flags + "g");
  const spans: Span[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    if (match[0].length === 0) {
      regex.lastIndex++;
      continue;
    }
    spans.push({ start: match.index, end: match.index + match[0].length });
  }
  return spans;
}

/**
 * Every protected span of a paragraph, sorted by start.
 */
export function protectedSpans(set: ExclusionSet, text: string): Span[] {
  const spans: Span[] = [];

  for (const literal of set.literals) {
    let from = text.indexOf(literal);
    while (from !== -1) {
      spans.push({ start: from, end: from + literal.length });
      from = text.indexOf(literal, from + 1);
    }
  }
  for (const pattern of set.patterns) {
    spans.push(...occurrences(pattern, text));
  }
  if (set.protectMarkup) {
    for (const pattern of MARKUP_PATTERNS) {
      spans.push(...occurrences(pattern, text));
    }
  }

  return spans.sort((a, b) => a.start - b.start || a.end - b.end);
}

function equalsEntry(set: ExclusionSet, original: string): boolean {
  const trimmed = original.trim();
  if (set.literals.includes(trimmed)) {
    return true;
  }
  return set.patterns.some((pattern) => {
    const anchored = new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace("g", ""));
    return anchored.test(trimmed);
  });
}

/**
 * Whether a candidate must be dropped.
 *
 * @param spans - protectedSpans() of the same text; computed when omitted
 */
export function isExcluded(
  set: ExclusionSet,
  text: string,
  candidate: Span,
  policy: ExclusionPolicy,
  spans?: readonly Span[]
): boolean {
  if (equalsEntry(set, text.slice(candidate.start, candidate.end))) {
    return true;
  }
  if (policy === "exact") {
    return false;
  }
  const protectedList = spans ?? protectedSpans(set, text);
  return protectedList.some((span) => candidate.start < span.end && span.start < candidate.end);
}
