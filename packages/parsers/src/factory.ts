/**
 * Parser Factory
 *
 * Maps file extensions to parser classes. New formats are added with
 * registerParser; lookups are case-insensitive.
 */

import { extname } from 'node:path';
import { UnsupportedFileTypeError } from '@fileclassify/core';
import { BaseParser } from './base.js';
import { TextParser } from './textParser.js';
import { PdfParser } from './pdfParser.js';
import { DocxParser } from './docxParser.js';
import { XlsxParser } from './xlsxParser.js';
import { PptxParser } from './pptxParser.js';

export type ParserConstructor = new (filePath: string) => BaseParser;

const TEXT_EXTENSIONS = [
  '.txt', '.md', '.log', '.csv', '.tsv',
  '.json', '.xml', '.yaml', '.yml', '.ini',
  '.html', '.css',
  '.js', '.ts', '.py', '.java', '.c', '.h', '.cpp', '.sh',
];

function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

export class ParserFactory {
  private static readonly parsers = new Map<string, ParserConstructor>([
    ...TEXT_EXTENSIONS.map((ext): [string, ParserConstructor] => [ext, TextParser]),
    ['.pdf', PdfParser],
    ['.docx', DocxParser],
    ['.xlsx', XlsxParser],
    ['.xlsm', XlsxParser],
    ['.pptx', PptxParser],
  ]);

  /**
   * Parser instance for a file, chosen by its extension
   */
  static getParser(filePath: string): BaseParser {
    const extension = extname(filePath).toLowerCase();
    const Parser = this.parsers.get(extension);

    if (!Parser) {
      throw new UnsupportedFileTypeError(extension);
    }

    return new Parser(filePath);
  }

  static hasParser(filePath: string): boolean {
    return this.parsers.has(extname(filePath).toLowerCase());
  }

  /**
   * Register (or replace) the parser for an extension
   */
  static registerParser(extension: string, parser: ParserConstructor): void {
    if (!(parser.prototype instanceof BaseParser)) {
      throw new TypeError('Parser class must extend BaseParser');
    }
    this.parsers.set(normalizeExtension(extension), parser);
  }

  static getSupportedExtensions(): string[] {
    return [...this.parsers.keys()];
  }
}
