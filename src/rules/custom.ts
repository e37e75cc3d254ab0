/**
 * Pattern rules declared in configuration.
 */

import type { CustomRule } from "../config/standards/schema.js";
import type { Rule } from "./types.js";

/**
 * Expand $1..$9, $& and $$ in a replacement template.
 */
export function expandTemplate(template: string, match: RegExpExecArray): string {
  return template.replace(/\$(\$|&|[1-9])/g, (_, token: string) => {
    if (token === "$") {
      return "$";
    }
    if (token === "&") {
      return match[0];
    }
    return match[Number(token)] ?? "";
  });
}

export function customRules(rules: readonly CustomRule[]): Rule[] {
  return rules.map(
    (rule): Rule => ({
      kind: "pattern",
      category: rule.category,
      name: rule.name,
      description: rule.description,
      scope: rule.appliesTo,
      exclusionPolicy: rule.exclusionPolicy,
      pattern: new RegExp(rule.pattern, `${rule.flags}g`),
      replace: (match) => expandTemplate(rule.replacement, match),
    })
  );
}
