/**
 * copy-standards: formatting-preserving copy normalization.
 *
 *   import { loadStandardsConfig, DEFAULT_STANDARDS_CONFIG, buildRuleSet, processDocument } from "copy-standards";
 *
 *   const config = loadStandardsConfig(DEFAULT_STANDARDS_CONFIG);
 *   const result = processDocument(document, buildRuleSet(config), config);
 */

export {
  loadStandardsConfig,
  loadStandardsConfigFromFile,
  validateStandardsConfig,
  StandardsConfigError,
  DEFAULT_STANDARDS_CONFIG,
  RULE_CATEGORY_ORDER,
  ALL_REGION_KINDS,
  RuleCategory,
  RegionKind,
  ExclusionPolicy,
  type StandardsConfig,
  type StandardsConfigInput,
  type ConfigValidationIssue,
} from "./config/standards/index.js";
export { ConfigError } from "./config/env.js";

export * from "./document/index.js";
export * from "./rules/index.js";
export * from "./pipeline/index.js";
export * from "./analysis/index.js";
export { createLogger, silentLogger, initRunId, type Logger, type LogLevel } from "./logging/index.js";
