import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { generateTargetPath } from '@fileclassify/rules';

describe('generateTargetPath', () => {
  const data = { category: 'Work', year: '2024', month: '01' };

  it('should join one folder per rule field', () => {
    expect(generateTargetPath('类型 >> 年份 >> 月份', data)).toBe(join('Work', '2024', '01'));
  });

  it('should follow the rule order', () => {
    expect(generateTargetPath('Year >> Category', data)).toBe(join('2024', 'Work'));
  });

  it('should use Unknown for missing or blank values', () => {
    expect(generateTargetPath('类型 >> 年份', { category: '  ' })).toBe(join('Unknown', 'Unknown'));
  });

  it('should use Unknown for a rule without fields', () => {
    expect(generateTargetPath('', data)).toBe('Unknown');
  });

  it('should ignore option lists when building the path', () => {
    expect(generateTargetPath('Category [Work, Personal] >> Year', data)).toBe(join('Work', '2024'));
  });

  it('should make values safe as folder names', () => {
    expect(generateTargetPath('Category', { category: 'Tax/Receipts' })).toBe('Tax_Receipts');
  });

  it('should read a field named like an Object member from the data', () => {
    expect(generateTargetPath('Constructor >> Year', { constructor: 'A', year: '2024' })).toBe(join('A', '2024'));
  });
});
