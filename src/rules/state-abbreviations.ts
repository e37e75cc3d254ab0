/**
 * State abbreviations: "N.Y." → "NY".
 *
 * Only punctuated two-letter postal codes standing alone as a token are
 * rewritten ("N.Y.C." and "U.S." are left alone). Letters match in any case
 * and keep the case they were written in.
 */

import { loadStateCodes } from "../data/index.js";
import type { CategorySettings } from "../config/standards/schema.js";
import { endsParagraph } from "./match.js";
import type { Rule } from "./types.js";

const PUNCTUATED_PAIR = /(?<![\p{L}\p{N}_.])([A-Za-z])\.([A-Za-z])\.(?![\p{L}\p{N}_])/gu;

export function stateAbbreviationRules(settings: CategorySettings): Rule[] {
  const codes = loadStateCodes();

  return [
    {
      kind: "pattern",
      category: "state_abbreviations",
      name: "postal-codes",
      description: "Drop the periods from punctuated two-letter state abbreviations",
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      pattern: PUNCTUATED_PAIR,
      replace: (match, context) => {
        const letters = `${match[1]}${match[2]}`;
        if (!codes.has(letters.toUpperCase())) {
          return null;
        }
        const end = match.index + match[0].length;
        return endsParagraph(context.text, end) ? `${letters}.` : letters;
      },
    },
  ];
}
