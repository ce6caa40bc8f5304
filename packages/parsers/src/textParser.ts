/**
 * Text Parser
 *
 * Plain text, markdown, source code and other text formats. Decoding is
 * tried in order: UTF-8 (with or without BOM), UTF-16 by BOM, Latin-1.
 */

import { readFile } from 'node:fs/promises';
import { BaseParser, type FileMetadata } from './base.js';

export type TextEncodingName = 'utf-8' | 'utf-16le' | 'utf-16be' | 'latin1';

export interface DecodedText {
  encoding: TextEncodingName;
  text: string;
}

/**
 * Decode raw bytes with the first encoding that fits
 */
export function decodeText(buffer: Buffer): DecodedText {
  if (buffer.length >= 2 && buffer[0] === 0xff && buffer[1] === 0xfe) {
    return { encoding: 'utf-16le', text: new TextDecoder('utf-16le').decode(buffer.subarray(2)) };
  }
  if (buffer.length >= 2 && buffer[0] === 0xfe && buffer[1] === 0xff) {
    return { encoding: 'utf-16be', text: new TextDecoder('utf-16be').decode(buffer.subarray(2)) };
  }

  try {
    // TextDecoder drops a UTF-8 BOM by default
    return { encoding: 'utf-8', text: new TextDecoder('utf-8', { fatal: true }).decode(buffer) };
  } catch {
    return { encoding: 'latin1', text: buffer.toString('latin1') };
  }
}

export class TextParser extends BaseParser {
  private decoded: DecodedText | null = null;

  private async decode(): Promise<DecodedText> {
    if (!this.decoded) {
      this.decoded = decodeText(await readFile(this.filePath));
    }
    return this.decoded;
  }

  async extractText(): Promise<string> {
    return (await this.decode()).text;
  }

  async extractMetadata(): Promise<FileMetadata> {
    const { encoding, text } = await this.decode();

    return {
      encoding,
      lineCount: text.split('\n').length,
      wordCount: text.split(/\s+/).filter((word) => word.length > 0).length,
      charCount: text.length,
    };
  }
}
