/**
 * Target Path Generation
 */

import { join } from 'node:path';
import { UNKNOWN_VALUE } from '@fileclassify/core';
import { sanitizeFilename } from '@fileclassify/utils';
import { parseRuleString } from './ruleParser.js';

function toSegment(value: unknown): string {
  if (value === undefined || value === null) {
    return UNKNOWN_VALUE;
  }
  const text = String(value).trim();
  if (!text) {
    return UNKNOWN_VALUE;
  }
  return sanitizeFilename(text) || UNKNOWN_VALUE;
}

/**
 * Relative folder path for a classified file
 *
 * One path segment per rule field, taken from the classification data.
 * Missing or blank values become "Unknown".
 *
 * @example
 * generateTargetPath('类型 >> 年份 >> 月份', { category: 'Work', year: '2024', month: '01' })
 * // 'Work/2024/01' (platform separator)
 */
export function generateTargetPath(
  rule: string,
  data: Readonly<Record<string, unknown>>
): string {
  const rules = parseRuleString(rule);
  if (rules.length === 0) {
    return UNKNOWN_VALUE;
  }

  const segments = rules.map(({ key }) =>
    Object.prototype.hasOwnProperty.call(data, key) ? toSegment(data[key]) : UNKNOWN_VALUE
  );

  return join(...segments);
}
