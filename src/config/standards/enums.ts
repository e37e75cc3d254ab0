/**
 * Domain enumerations for the copy standards.
 *
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║  The order of RuleCategory is the order in which categories are applied.  ║
 * ║  Later categories see text already altered by earlier ones, and spans     ║
 * ║  committed by an earlier category are never rewritten by a later one.     ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 */

import { z } from "zod";

/**
 * Rule categories, in fixed application order.
 *
 * @readonly
 * @enum {string}
 */
export const RuleCategory = z.enum([
  "state_abbreviations",
  "punctuation",
  "digital_terms",
  "times",
  "numbers",
  "healthcare_terms",
  "branding",
  "final_validation",
]);
export type RuleCategory = z.infer<typeof RuleCategory>;

/** Categories in application order. */
export const RULE_CATEGORY_ORDER: readonly RuleCategory[] = RuleCategory.options;

/**
 * Kinds of document region produced by the marker parser.
 *
 * - page_copy: between start_page_copy / end_page_copy
 * - disclaimer: between start_disclaimer / end_disclaimer
 * - unmarked: everything outside a marked region
 */
export const RegionKind = z.enum(["page_copy", "disclaimer", "unmarked"]);
export type RegionKind = z.infer<typeof RegionKind>;

export const ALL_REGION_KINDS: readonly RegionKind[] = RegionKind.options;

/**
 * How a rule treats the exclusion set.
 *
 * - exact: drop a candidate only when its trimmed text equals an entry
 * - overlap: also drop a candidate touching any occurrence of an entry
 */
export const ExclusionPolicy = z.enum(["exact", "overlap"]);
export type ExclusionPolicy = z.infer<typeof ExclusionPolicy>;
