/**
 * Change log summaries.
 */

import { RULE_CATEGORY_ORDER, type RuleCategory } from "../config/standards/enums.js";
import type { ChangeLogEntry, CorrectionSummary } from "./types.js";

/**
 * Count replacements by category. Removed markers are not corrections and
 * are not counted.
 */
export function summarizeChanges(changes: readonly ChangeLogEntry[]): CorrectionSummary {
  const counts = new Map<RuleCategory, number>();
  let total = 0;
  for (const entry of changes) {
    if (entry.kind === "replacement") {
      counts.set(entry.category, (counts.get(entry.category) ?? 0) + 1);
      total++;
    }
  }

  return {
    total,
    byCategory: RULE_CATEGORY_ORDER.flatMap((category) => {
      const count = counts.get(category);
      return count === undefined ? [] : [{ category, count }];
    }),
  };
}
