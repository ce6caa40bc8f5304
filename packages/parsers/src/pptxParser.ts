/**
 * PowerPoint Parser
 *
 * Reads the slide parts of a PPTX package in slide order. Each slide's text
 * follows a "[Slide n]" line, one line per paragraph.
 */

import type JSZip from 'jszip';
import { ParseError, errorMessage } from '@fileclassify/core';
import { BaseParser, type FileMetadata } from './base.js';
import { elementTexts, innerXml, loadZip, readCoreProperties, readZipText } from './officeXml.js';

const SLIDE_PART = /^ppt\/slides\/slide(\d+)\.xml$/;

function slideNumber(partName: string): number {
  return Number.parseInt(SLIDE_PART.exec(partName)?.[1] ?? '0', 10);
}

function slideLines(xml: string): string[] {
  return innerXml(xml, 'a:p')
    .map((paragraph) => elementTexts(paragraph, 'a:t').join('').trim())
    .filter((line) => line.length > 0);
}

export class PptxParser extends BaseParser {
  private zip: JSZip | null = null;

  private async open(): Promise<JSZip> {
    if (!this.zip) {
      try {
        this.zip = await loadZip(this.filePath);
      } catch (error) {
        throw new ParseError('PPTX', this.filePath, errorMessage(error));
      }
    }
    return this.zip;
  }

  private async slideParts(): Promise<string[]> {
    const zip = await this.open();
    return Object.keys(zip.files)
      .filter((name) => SLIDE_PART.test(name))
      .sort((a, b) => slideNumber(a) - slideNumber(b));
  }

  async extractText(): Promise<string> {
    const zip = await this.open();
    const lines: string[] = [];

    for (const [index, part] of (await this.slideParts()).entries()) {
      lines.push(`[Slide ${index + 1}]`);
      lines.push(...slideLines((await readZipText(zip, part)) ?? ''));
    }

    return lines.join('\n');
  }

  async extractMetadata(): Promise<FileMetadata> {
    const properties = await readCoreProperties(await this.open());

    return {
      ...properties,
      slideCount: (await this.slideParts()).length,
    };
  }
}
