/**
 * Trademarks: the first mention of a mark in a document carries its symbol.
 *
 * Brand-term entries whose replacement is a trademarked term are folded
 * into the trademark rule as aliases, so "Example Health" written on first
 * mention becomes "ExampleHealth®" in a single pass and later mentions
 * become plain "ExampleHealth". Mentions in regions outside the branding
 * scope do not count.
 */

import type { CategorySettings, TermReplacement, Trademark } from "../config/standards/schema.js";
import { escapeRegExp, wordBounded } from "./match.js";
import type { Rule } from "./types.js";

/** Brand-term entries handled by a trademark rule instead of the lookup table. */
export function isTrademarkAlias(entry: TermReplacement, trademarks: readonly Trademark[]): boolean {
  return trademarks.some((mark) => mark.term === entry.to);
}

export function trademarkRules(
  settings: CategorySettings,
  trademarks: readonly Trademark[],
  terms: readonly TermReplacement[] = []
): Rule[] {
  return trademarks.map((mark): Rule => {
    const forms = [mark.term, ...terms.filter((entry) => entry.to === mark.term).map((entry) => entry.from)]
      .sort((a, b) => b.length - a.length)
      .map(escapeRegExp);
    const pattern = new RegExp(wordBounded(forms.join("|")), "gu");
    const mentioned = (text: string) => new RegExp(pattern.source, "u").test(text);

    return {
      kind: "pattern",
      category: "branding",
      name: `trademark-${mark.term.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, "-")}`,
      description: `Add ${mark.symbol} to the first mention of ${mark.term}`,
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      pattern,
      replace: (match, context) => {
        const mentionedEarlier = context.paragraphs
          .slice(0, context.paragraphIndex)
          .some((text, index) => settings.appliesTo.includes(context.paragraphRegions[index]) && mentioned(text));
        const isFirst = !mentionedEarlier && !mentioned(context.text.slice(0, match.index));
        const marked = context.text.charAt(match.index + match[0].length) === mark.symbol;

        if (isFirst && !marked) {
          return `${mark.term}${mark.symbol}`;
        }
        return match[0] === mark.term ? null : mark.term;
      },
    };
  });
}
