/**
 * Excel Parser
 *
 * One "[Sheet: name]" line per worksheet followed by its non-empty rows,
 * cells separated by tabs.
 */

import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import { ParseError, errorMessage } from '@fileclassify/core';
import { BaseParser, type FileMetadata } from './base.js';

function isoDate(value: Date | undefined): string | null {
  return value instanceof Date && !Number.isNaN(value.getTime()) ? value.toISOString() : null;
}

export class XlsxParser extends BaseParser {
  private workbook: Workbook | null = null;

  private async load(): Promise<Workbook> {
    if (!this.workbook) {
      const workbook = new ExcelJS.Workbook();
      try {
        await workbook.xlsx.readFile(this.filePath);
      } catch (error) {
        throw new ParseError('XLSX', this.filePath, errorMessage(error));
      }
      this.workbook = workbook;
    }
    return this.workbook;
  }

  async extractText(): Promise<string> {
    const workbook = await this.load();
    const lines: string[] = [];

    for (const sheet of workbook.worksheets) {
      lines.push(`[Sheet: ${sheet.name}]`);
      sheet.eachRow((row) => {
        const cells: string[] = [];
        row.eachCell({ includeEmpty: true }, (cell, column) => {
          cells[column - 1] = cell.text;
        });
        const line = cells.join('\t');
        if (line.trim()) {
          lines.push(line);
        }
      });
    }

    return lines.join('\n');
  }

  async extractMetadata(): Promise<FileMetadata> {
    const workbook = await this.load();
    const sheetNames = workbook.worksheets.map((sheet) => sheet.name);

    return {
      title: workbook.title || null,
      author: workbook.creator || null,
      subject: workbook.subject || null,
      keywords: workbook.keywords || null,
      created: isoDate(workbook.created),
      modified: isoDate(workbook.modified),
      sheetCount: sheetNames.length,
      sheetNames,
    };
  }
}
