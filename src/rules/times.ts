/**
 * Time formatting.
 *
 *   3:00 PM          → 3 pm
 *   9:30 A.M.        → 9:30 am
 *   8 AM-5 PM        → 8 am–5 pm
 *   8:00 am — 5 p.m. → 8 am–5 pm
 *
 * The en dash is introduced only inside a time range. The single-time rule
 * skips times that belong to a range, so the two rules never overlap. Its
 * lookahead takes an optional period: backtracking can leave the final dot
 * of "8 a.m.-5 p.m." outside the match.
 */

import type { CategorySettings } from "../config/standards/schema.js";
import { endsParagraph } from "./match.js";
import type { Rule } from "./types.js";

const TIME = String.raw`(\d{1,2})(?::(\d{2}))?\s*([ap])\.?\s*m(\.?)`;
const TIME_TAIL = String.raw`(?:\d{1,2})(?::\d{2})?\s*[ap]\.?\s*m\.?`;
const NOT_WORD_AFTER = String.raw`(?![\p{L}\p{N}_])`;
const DASH = "[-–—]";

const RANGE_PATTERN = new RegExp(
  String.raw`(?<![\p{L}\p{N}_:.])${TIME}\s*${DASH}\s*${TIME}${NOT_WORD_AFTER}`,
  "giu"
);

const SINGLE_PATTERN = new RegExp(
  String.raw`(?<![\p{L}\p{N}_:.])(?<!${DASH}\s*)${TIME}${NOT_WORD_AFTER}(?!\.?\s*${DASH}\s*${TIME_TAIL})`,
  "giu"
);

/**
 * "3", "00", "p" → "3 pm". Returns null for impossible clock times.
 */
export function formatClockTime(hours: string, minutes: string | undefined, meridiem: string): string | null {
  const h = Number(hours);
  if (h < 1 || h > 12) {
    return null;
  }
  if (minutes !== undefined && Number(minutes) > 59) {
    return null;
  }
  const suffix = `${meridiem.toLowerCase()}m`;
  return minutes === undefined || minutes === "00" ? `${h} ${suffix}` : `${h}:${minutes} ${suffix}`;
}

export function timeRules(settings: CategorySettings): Rule[] {
  return [
    {
      kind: "pattern",
      category: "times",
      name: "time-range",
      description: "Format both ends of a time range and join them with an en dash",
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      pattern: RANGE_PATTERN,
      replace: (match, context) => {
        const from = formatClockTime(match[1], match[2], match[3]);
        const to = formatClockTime(match[5], match[6], match[7]);
        if (from === null || to === null) {
          return null;
        }
        const keepPeriod = match[8] === "." && endsParagraph(context.text, match.index + match[0].length);
        return `${from}–${to}${keepPeriod ? "." : ""}`;
      },
    },
    {
      kind: "pattern",
      category: "times",
      name: "clock-time",
      description: "Lowercase am/pm without periods and drop :00",
      scope: settings.appliesTo,
      exclusionPolicy: "overlap",
      pattern: SINGLE_PATTERN,
      replace: (match, context) => {
        const formatted = formatClockTime(match[1], match[2], match[3]);
        if (formatted === null) {
          return null;
        }
        const keepPeriod = match[4] === "." && endsParagraph(context.text, match.index + match[0].length);
        return `${formatted}${keepPeriod ? "." : ""}`;
      },
    },
  ];
}
