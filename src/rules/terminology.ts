/**
 * Term tables: digital vocabulary, healthcare vocabulary and brand wording.
 *
 * Digital and healthcare terms match in any case and keep the original's
 * capitalization ("E-mail" → "Email"). Brand terms are literal and
 * case-sensitive.
 */

import type { CategorySettings, StandardsConfig } from "../config/standards/schema.js";
import { isTrademarkAlias } from "./branding.js";
import type { Rule } from "./types.js";

export function digitalTermRules(settings: CategorySettings, config: StandardsConfig): Rule[] {
  if (config.digitalTerms.length === 0) {
    return [];
  }
  return [
    {
      kind: "lookup",
      category: "digital_terms",
      name: "term-table",
      description: "Use the house wording for digital terms",
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      entries: config.digitalTerms,
      caseInsensitive: true,
      preserveCapitalization: true,
    },
  ];
}

export function healthcareTermRules(settings: CategorySettings, config: StandardsConfig): Rule[] {
  if (config.healthcareTerms.length === 0) {
    return [];
  }
  return [
    {
      kind: "lookup",
      category: "healthcare_terms",
      name: "term-table",
      description: "Use the house wording for healthcare terms",
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      entries: config.healthcareTerms,
      caseInsensitive: true,
      preserveCapitalization: true,
    },
  ];
}

/**
 * Entries whose replacement is a trademarked term are left to the
 * trademark rules.
 */
export function brandTermRules(settings: CategorySettings, config: StandardsConfig): Rule[] {
  const entries = config.branding.terms.filter((entry) => !isTrademarkAlias(entry, config.branding.trademarks));
  if (entries.length === 0) {
    return [];
  }
  return [
    {
      kind: "lookup",
      category: "branding",
      name: "brand-terms",
      description: "Use the approved spelling of brand names",
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      entries,
      caseInsensitive: false,
      preserveCapitalization: false,
    },
  ];
}
