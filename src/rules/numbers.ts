/**
 * Number formatting.
 *
 * - Standalone integers 1–9 are spelled out ("3 children" → "three children").
 * - Integers at or above the threshold get thousands separators
 *   ("15000" → "15,000").
 *
 * A number is left alone when it is part of a larger token: model numbers
 * and IDs ("X100", "3B"), decimals and ranges ("3.5", "5-9"), phone
 * numbers ("555-1234"), money and percentages ("$5", "5%"), numbers with a
 * leading zero, very long digit strings, and ZIP codes after a state code.
 * Years are never given separators.
 */

import type { CategorySettings, NumberSettings } from "../config/standards/schema.js";
import { startsSentence } from "./match.js";
import type { Rule } from "./types.js";

const NUMBER_TOKEN = /\d{1,3}(?:,\d{3})+(?!\d)|\d+/g;

const NUMBER_WORDS = ["zero", "one", "two", "three", "four", "five", "six", "seven", "eight", "nine"];

const ALNUM = /[\p{L}\p{N}_]/u;
const DIGIT = /\p{N}/u;
const JOINERS = new Set([".", ",", ":", "/", "-", "–", "‑"]);
const CURRENCY = new Set(["$", "€", "£", "¥", "#"]);
const SIGNS = new Set(["-", "+", "−"]);

/**
 * Whether the number at [start, end) is glued to surrounding text.
 */
export function isEmbeddedNumber(text: string, start: number, end: number): boolean {
  const before = text.charAt(start - 1);
  const after = text.charAt(end);

  if (ALNUM.test(before) || ALNUM.test(after)) {
    return true;
  }
  // 3.5, 5-9, 555-1234, 1/2, 10:30
  if (JOINERS.has(before) && ALNUM.test(text.charAt(start - 2))) {
    return true;
  }
  if (JOINERS.has(after) && DIGIT.test(text.charAt(end + 1))) {
    return true;
  }
  if (CURRENCY.has(before) || after === "%") {
    return true;
  }
  // Signed: "-3" but not "3-day"
  if (SIGNS.has(before) && !ALNUM.test(text.charAt(start - 2))) {
    return true;
  }
  return false;
}

/** A five-digit number right after "NY " or "NY, " is a ZIP code. */
function isZipCode(text: string, start: number, digits: string): boolean {
  return digits.length === 5 && /(?:^|[^\p{L}])\p{Lu}{2},? $/u.test(text.slice(Math.max(0, start - 5), start));
}

export function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

export function spellOut(value: number): string {
  return NUMBER_WORDS[value];
}

export function numberRules(settings: CategorySettings, numbers: NumberSettings): Rule[] {
  return [
    {
      kind: "pattern",
      category: "numbers",
      name: "spell-out",
      description: `Spell out standalone integers from 1 to ${numbers.spellOutMax}`,
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      pattern: NUMBER_TOKEN,
      replace: (match, context) => {
        const digits = match[0];
        if (!/^[1-9]$/.test(digits) || Number(digits) > numbers.spellOutMax) {
          return null;
        }
        if (isEmbeddedNumber(context.text, match.index, match.index + digits.length)) {
          return null;
        }
        const word = spellOut(Number(digits));
        return startsSentence(context.text, match.index)
          ? word.charAt(0).toUpperCase() + word.slice(1)
          : word;
      },
    },
    {
      kind: "pattern",
      category: "numbers",
      name: "thousands-separators",
      description: `Group integers of ${numbers.thousandsThreshold} and above with commas`,
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      pattern: NUMBER_TOKEN,
      replace: (match, context) => {
        const token = match[0];
        const digits = token.replace(/,/g, "");
        const value = Number(digits);

        if (value < numbers.thousandsThreshold || digits.startsWith("0")) {
          return null;
        }
        if (!token.includes(",")) {
          if (digits.length >= numbers.phoneDigitThreshold) {
            return null;
          }
          if (digits.length === 4 && value >= numbers.yearRange.min && value <= numbers.yearRange.max) {
            return null;
          }
          if (isZipCode(context.text, match.index, digits)) {
            return null;
          }
        }
        if (isEmbeddedNumber(context.text, match.index, match.index + token.length)) {
          return null;
        }
        return groupThousands(digits);
      },
    },
  ];
}
