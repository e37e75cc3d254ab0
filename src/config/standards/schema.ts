/**
 * Standards configuration schema definition.
 *
 * The configuration is validated once, deep frozen, and then threaded
 * explicitly through every pipeline call. Nothing in the rule engine reads
 * global state; two documents processed with the same configuration value
 * are processed identically.
 */

import { z } from "zod";
import { RuleCategory, RegionKind, ExclusionPolicy } from "./enums.js";

/**
 * Per-category switch and scope.
 */
export const CategorySettingsSchema = z
  .object({
    /** Whether the category runs at all */
    enabled: z.boolean().describe("Whether rules of this category are applied"),

    /** Region kinds the category applies to */
    appliesTo: z
      .array(RegionKind)
      .min(1)
      .default([...RegionKind.options])
      .describe("Region kinds the category's rules may rewrite"),
  })
  .strict();

export type CategorySettings = z.infer<typeof CategorySettingsSchema>;

export const CategoriesSchema = z
  .object({
    state_abbreviations: CategorySettingsSchema,
    punctuation: CategorySettingsSchema,
    digital_terms: CategorySettingsSchema,
    times: CategorySettingsSchema,
    numbers: CategorySettingsSchema,
    healthcare_terms: CategorySettingsSchema,
    branding: CategorySettingsSchema,
    final_validation: CategorySettingsSchema,
  })
  .strict();

export type Categories = z.infer<typeof CategoriesSchema>;

/**
 * A literal term substitution.
 */
export const TermReplacementSchema = z
  .object({
    from: z.string().min(1).describe("Text to look for"),
    to: z.string().describe("Replacement text"),
  })
  .strict()
  .refine((data) => data.from !== data.to, {
    message: "from and to must differ",
  });

export type TermReplacement = z.infer<typeof TermReplacementSchema>;

/**
 * Trademark symbol added to the first mention of a term.
 */
export const TrademarkSchema = z
  .object({
    term: z.string().min(1),
    symbol: z.enum(["®", "™", "℠"]).default("®"),
  })
  .strict();

export type Trademark = z.infer<typeof TrademarkSchema>;

/**
 * Number formatting settings.
 */
export const NumberSettingsSchema = z
  .object({
    /** Largest integer spelled out as a word (1..spellOutMax) */
    spellOutMax: z.number().int().min(1).max(9).default(9),

    /** Integers at or above this value receive thousands separators */
    thousandsThreshold: z.number().int().min(1000).default(1000),

    /** Four-digit years in this range never receive separators */
    yearRange: z
      .object({
        min: z.number().int(),
        max: z.number().int(),
      })
      .refine((data) => data.min <= data.max, {
        message: "min must be less than or equal to max",
      })
      .default({ min: 1900, max: 2099 }),

    /** Digit strings this long are treated as phone numbers or IDs */
    phoneDigitThreshold: z.number().int().min(5).default(10),
  })
  .strict();

export type NumberSettings = z.infer<typeof NumberSettingsSchema>;

/**
 * Rule contributed by configuration rather than code.
 */
export const CustomRuleSchema = z
  .object({
    name: z.string().min(1).regex(/^[a-z0-9-]+$/, "use lowercase letters, digits and dashes"),
    category: RuleCategory,
    description: z.string().default(""),
    /** RegExp source */
    pattern: z.string().min(1),
    /** RegExp flags; "g" is always added */
    flags: z.string().regex(/^[imsu]*$/, "allowed flags are i, m, s and u").default(""),
    /** Replacement template; $1..$9 refer to capture groups */
    replacement: z.string(),
    exclusionPolicy: ExclusionPolicy.default("overlap"),
    appliesTo: z.array(RegionKind).min(1).default([...RegionKind.options]),
  })
  .strict()
  .superRefine((data, ctx) => {
    try {
      new RegExp(data.pattern, data.flags);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pattern"],
        message: `invalid regular expression: ${err instanceof Error ? err.message : String(err)}`,
      });
    }
  });

export type CustomRule = z.infer<typeof CustomRuleSchema>;

/**
 * Reporting targets. These never influence rewriting.
 */
export const TargetsSchema = z
  .object({
    wordCount: z
      .object({
        target: z.number().int().min(1),
        tolerance: z.number().int().min(0).default(50),
      })
      .strict()
      .optional(),

    readingLevel: z
      .object({
        target: z.number().min(1).max(18),
        tolerance: z.number().min(0).default(1),
      })
      .strict()
      .optional()
      .describe("Target Flesch-Kincaid grade"),

    keywords: z
      .array(z.string().min(1))
      .default([])
      .describe("Phrases whose density is reported"),
  })
  .strict();

export type Targets = z.infer<typeof TargetsSchema>;

/**
 * Complete standards configuration.
 */
export const StandardsConfigSchema = z
  .object({
    categories: CategoriesSchema,

    /** Literal terms no rule may alter */
    exclusions: z.array(z.string().min(1)).default([]),

    /** RegExp sources whose matches no rule may alter */
    exclusionPatterns: z
      .array(z.string().min(1))
      .default([])
      .refine(
        (sources) =>
          sources.every((source) => {
            try {
              new RegExp(source);
              return true;
            } catch {
              return false;
            }
          }),
        { message: "every exclusion pattern must be a valid regular expression" }
      ),

    /** Protect URLs, [bracketed] and <angled> content */
    protectMarkup: z.boolean().default(true),

    digitalTerms: z.array(TermReplacementSchema).default([]),
    healthcareTerms: z.array(TermReplacementSchema).default([]),

    branding: z
      .object({
        terms: z.array(TermReplacementSchema).default([]),
        trademarks: z.array(TrademarkSchema).default([]),
      })
      .strict()
      .default({}),

    numbers: NumberSettingsSchema.default({}),

    customRules: z.array(CustomRuleSchema).default([]),

    targets: TargetsSchema.default({}),
  })
  .strict();

export type StandardsConfig = z.infer<typeof StandardsConfigSchema>;

/** Input shape accepted by the loader (defaults not yet applied). */
export type StandardsConfigInput = z.input<typeof StandardsConfigSchema>;
