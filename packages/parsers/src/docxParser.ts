/**
 * Word Parser
 *
 * Paragraph text through mammoth; document properties from the package.
 */

import mammoth from 'mammoth';
import { ParseError, errorMessage } from '@fileclassify/core';
import { BaseParser, type FileMetadata } from './base.js';
import { compactLines, loadZip, readCoreProperties } from './officeXml.js';

export class DocxParser extends BaseParser {
  private paragraphs: string[] | null = null;

  private async readParagraphs(): Promise<string[]> {
    if (!this.paragraphs) {
      try {
        const result = await mammoth.extractRawText({ path: this.filePath });
        this.paragraphs = compactLines(result.value);
      } catch (error) {
        throw new ParseError('DOCX', this.filePath, errorMessage(error));
      }
    }
    return this.paragraphs;
  }

  async extractText(): Promise<string> {
    return (await this.readParagraphs()).join('\n');
  }

  async extractMetadata(): Promise<FileMetadata> {
    const paragraphs = await this.readParagraphs();
    const properties = await readCoreProperties(await loadZip(this.filePath));

    return {
      ...properties,
      paragraphCount: paragraphs.length,
      wordCount: paragraphs.join(' ').split(/\s+/).filter((word) => word.length > 0).length,
    };
  }
}
