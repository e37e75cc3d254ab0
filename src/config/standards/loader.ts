/**
 * Standards configuration loader and validator.
 *
 * Responsible for:
 * - Validating configuration against the schema with fail-fast behavior
 * - Producing structured, path-addressed error messages
 * - Checking cross-field constraints zod can't express
 * - Freezing the result so it can be shared across concurrent runs
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { StandardsConfigSchema, type StandardsConfig } from "./schema.js";

/**
 * Structured validation error for standards configuration.
 */
export class StandardsConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "StandardsConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Standards configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code, or a local code for cross-field checks */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Deep freeze an object to enforce runtime immutability.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Reflect.ownKeys(obj)) {
    const value: unknown = Reflect.get(obj, name);
    if (value && typeof value === "object" && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

/**
 * Cross-field checks.
 *
 * A term listed twice in one table would make the combined lookup rule
 * ambiguous, and a term whose replacement is itself a table entry would
 * break idempotence (the second run would rewrite the first run's output).
 */
function validateConstraints(config: StandardsConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  const tables: Array<[string, readonly { from: string; to: string }[], boolean]> = [
    ["digitalTerms", config.digitalTerms, true],
    ["healthcareTerms", config.healthcareTerms, true],
    ["branding.terms", config.branding.terms, false],
  ];

  for (const [name, entries, caseInsensitive] of tables) {
    const fold = (s: string) => (caseInsensitive ? s.toLowerCase() : s);
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      const key = fold(entry.from);
      if (seen.has(key)) {
        issues.push({
          path: [...name.split("."), index, "from"],
          message: `duplicate term "${entry.from}"`,
          code: "duplicate",
        });
      }
      seen.add(key);
    });
    entries.forEach((entry, index) => {
      if (seen.has(fold(entry.to))) {
        issues.push({
          path: [...name.split("."), index, "to"],
          message: `replacement "${entry.to}" is itself a term in the same table`,
          code: "not_idempotent",
        });
      }
    });
  }

  const trademarkTerms = new Set<string>();
  config.branding.trademarks.forEach((mark, index) => {
    if (trademarkTerms.has(mark.term)) {
      issues.push({
        path: ["branding", "trademarks", index, "term"],
        message: `duplicate trademark "${mark.term}"`,
        code: "duplicate",
      });
    }
    trademarkTerms.add(mark.term);
  });

  const ruleNames = new Set<string>();
  config.customRules.forEach((rule, index) => {
    const key = `${rule.category}/${rule.name}`;
    if (ruleNames.has(key)) {
      issues.push({
        path: ["customRules", index, "name"],
        message: `duplicate custom rule "${key}"`,
        code: "duplicate",
      });
    }
    ruleNames.add(key);
  });

  return issues;
}

/**
 * Validate and load standards configuration.
 *
 * @param input - Raw configuration object (e.g. parsed JSON)
 * @returns Validated, defaulted and frozen configuration
 * @throws StandardsConfigError if validation fails
 */
export function loadStandardsConfig(input: unknown): Readonly<StandardsConfig> {
  const result = StandardsConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new StandardsConfigError(
      `Invalid standards configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  const issues = validateConstraints(result.data);
  if (issues.length > 0) {
    throw new StandardsConfigError(
      `Invalid standards configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return deepFreeze(result.data);
}

/**
 * Load standards configuration from a JSON file.
 *
 * @throws StandardsConfigError if the file is unreadable, not JSON, or invalid
 */
export function loadStandardsConfigFromFile(path: string): Readonly<StandardsConfig> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new StandardsConfigError(`Cannot read standards configuration: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "io_error" },
    ]);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new StandardsConfigError(`Standards configuration is not valid JSON: ${path}`, [
      { path: [], message: err instanceof Error ? err.message : String(err), code: "invalid_json" },
    ]);
  }

  return loadStandardsConfig(data);
}

/**
 * Validate standards configuration without throwing.
 */
export function validateStandardsConfig(input: unknown): {
  success: boolean;
  config?: StandardsConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = StandardsConfigSchema.safeParse(input);

  if (!result.success) {
    return { success: false, errors: formatZodIssues(result.error.issues) };
  }

  const issues = validateConstraints(result.data);
  if (issues.length > 0) {
    return { success: false, errors: issues };
  }

  return { success: true, config: result.data };
}
