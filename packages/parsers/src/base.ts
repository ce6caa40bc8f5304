/**
 * Base Parser
 *
 * Every content parser extends this class. Construction fails fast when the
 * file does not exist; reading happens lazily in the extract methods.
 */

import { existsSync } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename, extname, resolve } from 'node:path';
import { NotFoundError, ValidationError } from '@fileclassify/core';

export interface FileInfo {
  name: string;
  stem: string;
  extension: string;
  size: number;
  created: Date;
  modified: Date;
  path: string;
}

export type FileMetadata = Record<string, string | number | boolean | string[] | null>;

export const DEFAULT_SUMMARY_LENGTH = 500;

export abstract class BaseParser {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);

    if (!existsSync(this.filePath)) {
      throw new NotFoundError('File', this.filePath);
    }
  }

  /**
   * Full text content of the file
   */
  abstract extractText(): Promise<string>;

  /**
   * Format-specific metadata
   */
  abstract extractMetadata(): Promise<FileMetadata>;

  async getFileInfo(): Promise<FileInfo> {
    const stats = await stat(this.filePath);
    const extension = extname(this.filePath);

    return {
      name: basename(this.filePath),
      stem: basename(this.filePath, extension),
      extension,
      size: stats.size,
      created: stats.birthtime,
      modified: stats.mtime,
      path: this.filePath,
    };
  }

  /**
   * Leading text of the file, truncated with "..." past maxLength characters
   */
  async extractSummary(maxLength: number = DEFAULT_SUMMARY_LENGTH): Promise<string> {
    if (!Number.isInteger(maxLength) || maxLength < 1) {
      throw new ValidationError('summary length', `must be a positive integer, got ${maxLength}`);
    }

    const text = await this.extractText();

    if (text.length <= maxLength) {
      return text;
    }

    return `${text.slice(0, maxLength)}...`;
  }

  toString(): string {
    return `${this.constructor.name}('${basename(this.filePath)}')`;
  }
}
