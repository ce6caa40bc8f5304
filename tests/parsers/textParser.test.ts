import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TextParser, decodeText } from '@fileclassify/parsers';
import { NotFoundError, ValidationError } from '@fileclassify/core';

describe('decodeText', () => {
  it('should decode UTF-8 and drop its byte order mark', () => {
    const buffer = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('合同 2024', 'utf8')]);

    expect(decodeText(buffer)).toEqual({ encoding: 'utf-8', text: '合同 2024' });
  });

  it('should decode UTF-16LE by its byte order mark', () => {
    const buffer = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('invoice', 'utf16le')]);

    expect(decodeText(buffer)).toEqual({ encoding: 'utf-16le', text: 'invoice' });
  });

  it('should fall back to Latin-1 for bytes that are not UTF-8', () => {
    expect(decodeText(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toEqual({ encoding: 'latin1', text: 'café' });
  });
});

describe('TextParser', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fileclassify-parser-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should refuse a file that does not exist', () => {
    expect(() => new TextParser(join(dir, 'missing.txt'))).toThrow(NotFoundError);
  });

  it('should report counts in its metadata', async () => {
    const path = join(dir, 'notes.md');
    await writeFile(path, 'Quarterly invoice\nfor March 2024');

    const metadata = await new TextParser(path).extractMetadata();

    expect(metadata).toEqual({ encoding: 'utf-8', lineCount: 2, wordCount: 5, charCount: 32 });
  });

  it('should truncate long summaries with an ellipsis', async () => {
    const path = join(dir, 'long.txt');
    await writeFile(path, 'abcdefghij');
    const parser = new TextParser(path);

    expect(await parser.extractSummary(4)).toBe('abcd...');
    expect(await parser.extractSummary(10)).toBe('abcdefghij');
  });

  it('should reject a summary length below one', async () => {
    const path = join(dir, 'short.txt');
    await writeFile(path, 'abcdefghij');
    const parser = new TextParser(path);

    await expect(parser.extractSummary(0)).rejects.toThrow(
      'Validation failed for summary length: must be a positive integer, got 0'
    );
    await expect(parser.extractSummary(-5)).rejects.toThrow(ValidationError);
  });

  it('should describe the file', async () => {
    const path = join(dir, 'Contract_2024.txt');
    await writeFile(path, 'signed');

    const info = await new TextParser(path).getFileInfo();

    expect(info).toMatchObject({
      name: 'Contract_2024.txt',
      stem: 'Contract_2024',
      extension: '.txt',
      size: 6,
      path,
    });
    expect(new TextParser(path).toString()).toBe("TextParser('Contract_2024.txt')");
  });
});
