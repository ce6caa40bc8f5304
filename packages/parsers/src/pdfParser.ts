/**
 * PDF Parser
 *
 * Text layer only, through unpdf's bundled pdf.js. Scanned pages without a
 * text layer yield no text.
 */

import { readFile } from 'node:fs/promises';
import { extractText, getDocumentProxy } from 'unpdf';
import { ParseError, errorMessage } from '@fileclassify/core';
import { BaseParser, type FileMetadata } from './base.js';

interface PdfContent {
  text: string;
  metadata: FileMetadata;
}

const INFO_FIELDS = {
  title: 'Title',
  author: 'Author',
  subject: 'Subject',
  creator: 'Creator',
  producer: 'Producer',
  created: 'CreationDate',
  modified: 'ModDate',
} as const;

function infoValue(info: unknown, key: string): string | null {
  if (typeof info !== 'object' || info === null) {
    return null;
  }
  const value: unknown = Reflect.get(info, key);
  return typeof value === 'string' && value.trim() ? value.trim() : null;
}

export class PdfParser extends BaseParser {
  private content: PdfContent | null = null;

  private async read(): Promise<PdfContent> {
    if (this.content) {
      return this.content;
    }

    try {
      const pdf = await getDocumentProxy(new Uint8Array(await readFile(this.filePath)));
      try {
        const { totalPages, text } = await extractText(pdf, { mergePages: true });
        const { info } = await pdf.getMetadata();

        const metadata: FileMetadata = { pageCount: totalPages };
        for (const [field, key] of Object.entries(INFO_FIELDS)) {
          metadata[field] = infoValue(info, key);
        }

        const merged = Array.isArray(text) ? text.join('\n') : text;
        this.content = { text: merged.trim(), metadata };
        return this.content;
      } finally {
        await pdf.destroy();
      }
    } catch (error) {
      throw new ParseError('PDF', this.filePath, errorMessage(error));
    }
  }

  async extractText(): Promise<string> {
    return (await this.read()).text;
  }

  async extractMetadata(): Promise<FileMetadata> {
    return (await this.read()).metadata;
  }
}
