/**
 * Candidate discovery: runs one rule over one paragraph.
 */

import type { Candidate, LookupRule, PatternRule, Rule, RuleContext } from "./types.js";

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Word boundary that also works next to non-word characters like "®". */
export function wordBounded(source: string): string {
  return `(?<![\\p{L}\\p{N}_])(?:${source})(?![\\p{L}\\p{N}_])`;
}

interface CompiledLookup {
  readonly pattern: RegExp;
  readonly byKey: ReadonlyMap<string, string>;
}

const compiledLookups = new WeakMap<LookupRule, CompiledLookup>();

/**
 * One alternation per table, longest terms first, so a single pass finds
 * non-overlapping occurrences.
 */
function compileLookup(rule: LookupRule): CompiledLookup {
  const cached = compiledLookups.get(rule);
  if (cached) {
    return cached;
  }

  const fold = (value: string) => (rule.caseInsensitive ? value.toLowerCase() : value);
  const terms = [...rule.entries].sort((a, b) => b.from.length - a.from.length);
  const source = terms.length > 0 ? terms.map((entry) => escapeRegExp(entry.from)).join("|") : "(?!)";
  const compiled: CompiledLookup = {
    pattern: new RegExp(wordBounded(source), rule.caseInsensitive ? "giu" : "gu"),
    byKey: new Map(terms.map((entry) => [fold(entry.from), entry.to])),
  };
  compiledLookups.set(rule, compiled);
  return compiled;
}

/**
 * Apply the capitalization of `original` to `replacement`: all caps stays
 * all caps, a leading capital stays a leading capital, anything else
 * leaves the replacement as configured.
 */
export function matchCapitalization(original: string, replacement: string): string {
  const hasLetters = /\p{L}/u.test(original);
  if (hasLetters && original.length > 1 && original === original.toUpperCase() && original !== original.toLowerCase()) {
    return replacement.toUpperCase();
  }
  const first = original.charAt(0);
  if (first !== first.toLowerCase()) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

function* execAll(pattern: RegExp, text: string): Generator<RegExpExecArray> {
  // Fresh instance per call: rules share RegExp objects and must not share lastIndex.
  const flags = pattern.flags.includes("g") ? pattern.flags : pattern.flags + "g";
  const regex = new RegExp(pattern.source, flags);
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    if (match[0].length === 0) {
      regex.lastIndex++;
      continue;
    }
    yield match;
  }
}

function findLookup(rule: LookupRule, context: RuleContext): Candidate[] {
  const { pattern, byKey } = compileLookup(rule);
  const candidates: Candidate[] = [];

  for (const match of execAll(pattern, context.text)) {
    const original = match[0];
    const configured = byKey.get(rule.caseInsensitive ? original.toLowerCase() : original);
    if (configured === undefined) {
      continue;
    }
    const replacement = rule.preserveCapitalization
      ? matchCapitalization(original, configured)
      : configured;
    candidates.push({
      rule,
      start: match.index,
      end: match.index + original.length,
      original,
      replacement,
    });
  }
  return candidates;
}

function findPattern(rule: PatternRule, context: RuleContext): Candidate[] {
  const candidates: Candidate[] = [];
  for (const match of execAll(rule.pattern, context.text)) {
    const replacement = rule.replace(match, context);
    if (replacement === null) {
      continue;
    }
    candidates.push({
      rule,
      start: match.index,
      end: match.index + match[0].length,
      original: match[0],
      replacement,
    });
  }
  return candidates;
}

/**
 * Every occurrence of `rule` in the context's paragraph, in text order.
 * Claims (replacement equal to the original) are included.
 */
export function findCandidates(rule: Rule, context: RuleContext): Candidate[] {
  switch (rule.kind) {
    case "lookup":
      return findLookup(rule, context);
    case "pattern":
      return findPattern(rule, context);
  }
}

/**
 * True when nothing but closing quotes, brackets and whitespace follows
 * `end`, so an abbreviation's final period doubles as the paragraph's full
 * stop. A capital after the abbreviation is not taken as a sentence break:
 * "N.Y. Department of Health" keeps going.
 */
export function endsParagraph(text: string, end: number): boolean {
  return /^["'”’)\]]*\s*$/u.test(text.slice(end));
}

/**
 * True when `start` begins a sentence: start of paragraph, or after
 * terminal punctuation and whitespace.
 */
export function startsSentence(text: string, start: number): boolean {
  const before = text.slice(0, start);
  return /^\s*$/.test(before) || /[.!?]["')\]]?\s+$/.test(before);
}
