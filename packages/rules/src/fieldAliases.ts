/**
 * Field names a rule may use, in Chinese or English, mapped to the keys
 * classification results carry. Lookup is on the lower-cased name.
 */
export const FIELD_ALIASES: ReadonlyMap<string, string> = new Map([
  ['类型', 'category'],
  ['category', 'category'],
  ['年份', 'year'],
  ['year', 'year'],
  ['月份', 'month'],
  ['month', 'month'],
  ['原文件名', 'original_name'],
  ['original name', 'original_name'],
  ['摘要', 'summary'],
  ['summary', 'summary'],
]);

export function resolveFieldKey(fieldName: string): string {
  const normalized = fieldName.trim().toLowerCase();
  return FIELD_ALIASES.get(normalized) ?? normalized;
}
