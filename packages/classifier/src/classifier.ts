/**
 * File Classifier
 *
 * Turns a file name (plus an optional content excerpt) into the fields the
 * rule engine sorts by. Without a usable model the placeholder result is
 * returned so that everything lands under "Unknown".
 */

import { basename, extname } from 'node:path';
import {
  CLASSIFICATION_FIELDS,
  UNKNOWN_VALUE,
  type ClassificationField,
  type ClassificationResult,
  type ParsedRule,
} from '@fileclassify/core';
import { createLogger, isNumber, isString } from '@fileclassify/utils';
import { matchOption } from './llm/base.js';
import type { LlmClient } from './llm/types.js';
import { buildDynamicPrompt, buildUserPrompt, getSystemPrompt } from './prompt.js';

const log = createLogger({ component: 'classifier' });

export interface ClassifyOptions {
  rules?: ParsedRule[];
  llm?: LlmClient;
  contentExcerpt?: string;
}

function stemOf(fileName: string): string {
  const name = basename(fileName);
  return basename(name, extname(name));
}

function isClassificationField(key: string): key is ClassificationField {
  return CLASSIFICATION_FIELDS.some((field) => field === key);
}

/**
 * Result used when no model is available
 */
export function placeholderClassification(fileName: string): ClassificationResult {
  const stem = stemOf(fileName);
  return {
    category: UNKNOWN_VALUE,
    year: UNKNOWN_VALUE,
    month: UNKNOWN_VALUE,
    summary: `File: ${stem}`,
    original_name: stem,
  };
}

/**
 * Map a free value onto one of a field's allowed options
 *
 * Exact (case-insensitive) matches win; otherwise the first option the value
 * mentions, falling back to the first option.
 */
export function coerceToOption(value: string, options: string[]): string {
  const exact = options.find((option) => option.toLowerCase() === value.trim().toLowerCase());
  return exact ?? matchOption(value, options);
}

function normalizeMonth(value: string): string {
  if (/^\d{1,2}$/.test(value)) {
    const month = Number.parseInt(value, 10);
    if (month >= 1 && month <= 12) {
      return month.toString().padStart(2, '0');
    }
  }
  return value;
}

/**
 * Fill, trim and constrain the model's raw JSON
 */
export function normalizeClassification(
  raw: Record<string, unknown>,
  fileName: string,
  rules: ParsedRule[] = []
): ClassificationResult {
  const result = placeholderClassification(fileName);

  for (const field of CLASSIFICATION_FIELDS) {
    const value = raw[field];
    if (isString(value) && value.trim()) {
      result[field] = value.trim();
    } else if (isNumber(value)) {
      result[field] = String(value);
    } else if (field !== 'original_name') {
      result[field] = UNKNOWN_VALUE;
    }
  }

  result.month = normalizeMonth(result.month);

  for (const rule of rules) {
    if (rule.options && rule.options.length > 0 && isClassificationField(rule.key)) {
      result[rule.key] = coerceToOption(result[rule.key], rule.options);
    }
  }

  return result;
}

/**
 * Classify a single file
 */
export async function classifyFile(
  fileName: string,
  options: ClassifyOptions = {}
): Promise<ClassificationResult> {
  const { rules, llm, contentExcerpt } = options;

  if (!llm || !llm.isAvailable()) {
    return placeholderClassification(fileName);
  }

  const systemPrompt = rules && rules.length > 0 ? buildDynamicPrompt(rules) : getSystemPrompt();
  const raw = await llm.extractJson(buildUserPrompt(basename(fileName), contentExcerpt), systemPrompt);
  const result = normalizeClassification(raw, fileName, rules);

  log.debug({ file: fileName, result }, 'File classified');
  return result;
}
