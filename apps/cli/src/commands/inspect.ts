/**
 * Inspect Command
 *
 * Prints what the content parser sees in a file.
 */

import { ParserFactory } from '@fileclassify/parsers';
import { ValidationError, errorMessage } from '@fileclassify/core';
import { formatBytes, formatTimestamp } from '@fileclassify/utils';
import { printError, printHeader, printKeyValue } from '../lib/output.js';

interface InspectOptions {
  length: string;
}

/**
 * --length value as a positive whole number of characters
 */
export function parseSummaryLength(value: string): number {
  const length = /^\d+$/.test(value.trim()) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isSafeInteger(length) || length < 1) {
    throw new ValidationError('--length', `expected a positive integer, got "${value}"`);
  }
  return length;
}

export async function inspectCommand(file: string, options: InspectOptions): Promise<void> {
  try {
    const length = parseSummaryLength(options.length);
    const parser = ParserFactory.getParser(file);
    const info = await parser.getFileInfo();
    const metadata = await parser.extractMetadata();
    const summary = await parser.extractSummary(length);

    printHeader(info.name);
    printKeyValue('Path', info.path);
    printKeyValue('Size', formatBytes(info.size));
    printKeyValue('Modified', formatTimestamp(info.modified));

    printHeader('Metadata');
    for (const [key, value] of Object.entries(metadata)) {
      if (value === null) {
        continue;
      }
      printKeyValue(key, Array.isArray(value) ? value.join(', ') : value);
    }

    printHeader('Summary');
    console.log(summary);
  } catch (error) {
    printError(errorMessage(error));
    process.exitCode = 1;
  }
}
