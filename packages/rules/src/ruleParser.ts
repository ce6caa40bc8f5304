/**
 * Rule Parser
 *
 * A rule string lists the folder levels to sort files into, outermost
 * first, separated by `>>`. Any level may restrict its values with a
 * bracketed option list:
 *
 *   Category [Contract, Invoice] >> Year
 *   类型 [合同, 发票] >> 年份
 */

import type { ParsedRule } from '@fileclassify/core';
import { resolveFieldKey } from './fieldAliases.js';

export const RULE_SEPARATOR = '>>';

const SEGMENT_PATTERN = /^([^[]+)(?:\s*\[([^\]]+)\])?$/;

// ASCII and full-width commas
const OPTION_SEPARATOR = /[,，]/;

function parseOptions(raw: string | undefined): string[] | null {
  if (!raw) {
    return null;
  }
  return raw
    .split(OPTION_SEPARATOR)
    .map((option) => option.trim())
    .filter((option) => option.length > 0);
}

/**
 * Parse a rule string into its ordered field list
 */
export function parseRuleString(rule: string): ParsedRule[] {
  if (!rule || !rule.trim()) {
    return [];
  }

  return rule
    .split(RULE_SEPARATOR)
    .map((part) => part.trim())
    .map((part) => {
      const match = SEGMENT_PATTERN.exec(part);
      if (!match) {
        return { key: resolveFieldKey(part), options: null };
      }
      return {
        key: resolveFieldKey(match[1] ?? ''),
        options: parseOptions(match[2]),
      };
    });
}

/**
 * Render parsed rules back into rule-string form
 */
export function formatRule(rules: ParsedRule[]): string {
  return rules
    .map((rule) => (rule.options && rule.options.length > 0
      ? `${rule.key} [${rule.options.join(', ')}]`
      : rule.key))
    .join(` ${RULE_SEPARATOR} `);
}
