/**
 * Rule catalog: rule types, candidate discovery, exclusions and the
 * category rule builders.
 */

export type { Rule, LookupRule, PatternRule, RuleContext, Candidate } from "./types.js";
export { ruleId, isClaim } from "./types.js";

export { findCandidates, matchCapitalization, escapeRegExp, wordBounded, endsParagraph, startsSentence } from "./match.js";

export {
  createExclusionSet,
  protectedSpans,
  isExcluded,
  type ExclusionSet,
  type Span,
} from "./exclusions.js";

export { stateAbbreviationRules } from "./state-abbreviations.js";
export { punctuationRules } from "./punctuation.js";
export { digitalTermRules, healthcareTermRules, brandTermRules } from "./terminology.js";
export { timeRules, formatClockTime } from "./times.js";
export { numberRules, isEmbeddedNumber, groupThousands, spellOut } from "./numbers.js";
export { trademarkRules, isTrademarkAlias } from "./branding.js";
export { customRules, expandTemplate } from "./custom.js";
export { finalValidationRules } from "./final-validation.js";

export { buildRuleSet, rulesFor, type RuleSet, type CategoryRules } from "./ruleset.js";
