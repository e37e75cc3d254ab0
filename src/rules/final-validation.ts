/**
 * Final pass. Collapses repeated spaces left behind by earlier rewrites;
 * the pipeline then re-checks the whole rule set against the result and
 * reports anything still matching as a residual finding.
 */

import type { CategorySettings } from "../config/standards/schema.js";
import { REPEATED_SPACES } from "./punctuation.js";
import type { Rule } from "./types.js";

export function finalValidationRules(settings: CategorySettings): Rule[] {
  return [
    {
      kind: "pattern",
      category: "final_validation",
      name: "single-spaces",
      description: "Collapse runs of spaces introduced by earlier replacements",
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      pattern: REPEATED_SPACES,
      replace: () => " ",
    },
  ];
}
