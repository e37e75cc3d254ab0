/**
 * Punctuation: standalone ampersands and repeated spaces.
 */

import type { CategorySettings } from "../config/standards/schema.js";
import type { Rule } from "./types.js";

export const REPEATED_SPACES = / {2,}/g;

export function punctuationRules(settings: CategorySettings): Rule[] {
  return [
    {
      kind: "pattern",
      category: "punctuation",
      name: "ampersand",
      description: "Spell out an ampersand standing between spaces",
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      pattern: /(?<=\s)&(?=\s)/g,
      replace: () => "and",
    },
    {
      kind: "pattern",
      category: "punctuation",
      name: "single-spaces",
      description: "Collapse runs of spaces to one",
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      pattern: REPEATED_SPACES,
      replace: () => " ",
    },
  ];
}
