/**
 * Classification Types
 */

/**
 * Fields a classification carries. Keys are the lower-case names the
 * language model returns and rules refer to.
 */
export const CLASSIFICATION_FIELDS = [
  'category',
  'year',
  'month',
  'summary',
  'original_name',
] as const;

export type ClassificationField = typeof CLASSIFICATION_FIELDS[number];

export type ClassificationResult = Record<ClassificationField, string>;

/**
 * Placeholder value for anything that cannot be determined
 */
export const UNKNOWN_VALUE = 'Unknown';

/**
 * One `>>`-separated segment of a rule string
 */
export interface ParsedRule {
  key: string;
  options: string[] | null;
}
