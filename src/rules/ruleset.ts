/**
 * Rule set assembly.
 *
 * A RuleSet is built once from a validated configuration and holds the
 * rules of every category in application order. Within a category, rules
 * are listed by priority; custom rules follow the built-in ones.
 */

import { RULE_CATEGORY_ORDER, type RuleCategory } from "../config/standards/enums.js";
import type { StandardsConfig } from "../config/standards/schema.js";
import { trademarkRules } from "./branding.js";
import { customRules } from "./custom.js";
import { createExclusionSet, type ExclusionSet } from "./exclusions.js";
import { finalValidationRules } from "./final-validation.js";
import { numberRules } from "./numbers.js";
import { punctuationRules } from "./punctuation.js";
import { stateAbbreviationRules } from "./state-abbreviations.js";
import { brandTermRules, digitalTermRules, healthcareTermRules } from "./terminology.js";
import { timeRules } from "./times.js";
import type { Rule } from "./types.js";

export interface CategoryRules {
  readonly category: RuleCategory;
  readonly rules: readonly Rule[];
}

export interface RuleSet {
  /** Every category, in application order, including disabled ones */
  readonly categories: readonly CategoryRules[];
  readonly exclusions: ExclusionSet;
}

function builtInRules(category: RuleCategory, config: StandardsConfig): Rule[] {
  const settings = config.categories[category];
  switch (category) {
    case "state_abbreviations":
      return stateAbbreviationRules(settings);
    case "punctuation":
      return punctuationRules(settings);
    case "digital_terms":
      return digitalTermRules(settings, config);
    case "times":
      return timeRules(settings);
    case "numbers":
      return numberRules(settings, config.numbers);
    case "healthcare_terms":
      return healthcareTermRules(settings, config);
    case "branding":
      return [
        ...brandTermRules(settings, config),
        ...trademarkRules(settings, config.branding.trademarks, config.branding.terms),
      ];
    case "final_validation":
      return finalValidationRules(settings);
  }
}

export function buildRuleSet(config: StandardsConfig): RuleSet {
  const custom = customRules(config.customRules);

  const categories = RULE_CATEGORY_ORDER.map(
    (category): CategoryRules =>
      Object.freeze({
        category,
        rules: Object.freeze([
          ...builtInRules(category, config),
          ...custom.filter((rule) => rule.category === category),
        ]),
      })
  );

  return Object.freeze({
    categories: Object.freeze(categories),
    exclusions: createExclusionSet(config),
  });
}

/** Rules of one category, in priority order. */
export function rulesFor(ruleSet: RuleSet, category: RuleCategory): readonly Rule[] {
  return ruleSet.categories.find((entry) => entry.category === category)?.rules ?? [];
}
