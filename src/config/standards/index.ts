/**
 * Standards configuration module.
 *
 * Usage:
 *   import { loadStandardsConfig, DEFAULT_STANDARDS_CONFIG } from "./config/standards/index.js";
 *
 *   const config = loadStandardsConfig(DEFAULT_STANDARDS_CONFIG);
 *
 *   const strict = loadStandardsConfig({
 *     ...DEFAULT_STANDARDS_CONFIG,
 *     exclusions: ["AT&T"],
 *   });
 */

export {
  RuleCategory,
  RegionKind,
  ExclusionPolicy,
  RULE_CATEGORY_ORDER,
  ALL_REGION_KINDS,
} from "./enums.js";

export type {
  StandardsConfig,
  StandardsConfigInput,
  CategorySettings,
  Categories,
  TermReplacement,
  Trademark,
  NumberSettings,
  CustomRule,
  Targets,
} from "./schema.js";

export {
  StandardsConfigSchema,
  CategorySettingsSchema,
  TermReplacementSchema,
  CustomRuleSchema,
  TargetsSchema,
} from "./schema.js";

export {
  loadStandardsConfig,
  loadStandardsConfigFromFile,
  validateStandardsConfig,
  StandardsConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_STANDARDS_CONFIG } from "./defaults.js";
