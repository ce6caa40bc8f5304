/**
 * Office Open XML helpers
 *
 * DOCX, XLSX and PPTX files are zip packages of XML parts. Only the few
 * elements the parsers need are read, so a full XML parser is not used.
 */

import { readFile } from 'node:fs/promises';
import JSZip from 'jszip';

export interface CoreProperties {
  title: string | null;
  author: string | null;
  subject: string | null;
  keywords: string | null;
  created: string | null;
  modified: string | null;
  lastModifiedBy: string | null;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

export function decodeXmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|amp|lt|gt|quot|apos);/gi, (match, entity: string) => {
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return String.fromCodePoint(Number.parseInt(entity.slice(2), 16));
    }
    if (entity.startsWith('#')) {
      return String.fromCodePoint(Number.parseInt(entity.slice(1), 10));
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}

function escapeTag(tag: string): string {
  return tag.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Raw inner XML of every <tag>...</tag> element, in document order
 */
export function innerXml(xml: string, tag: string): string[] {
  const name = escapeTag(tag);
  const pattern = new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${name}>`, 'g');
  return [...xml.matchAll(pattern)].map((match) => match[1] ?? '');
}

/**
 * Decoded text of every <tag> element
 */
export function elementTexts(xml: string, tag: string): string[] {
  return innerXml(xml, tag).map(decodeXmlEntities);
}

function firstText(xml: string, tag: string): string | null {
  const value = elementTexts(xml, tag)[0]?.trim();
  return value ? value : null;
}

export async function loadZip(filePath: string): Promise<JSZip> {
  return JSZip.loadAsync(await readFile(filePath));
}

export async function readZipText(zip: JSZip, partName: string): Promise<string | null> {
  const part = zip.file(partName);
  return part ? part.async('string') : null;
}

/**
 * Document properties from docProps/core.xml; absent values are null
 */
export async function readCoreProperties(zip: JSZip): Promise<CoreProperties> {
  const xml = (await readZipText(zip, 'docProps/core.xml')) ?? '';

  return {
    title: firstText(xml, 'dc:title'),
    author: firstText(xml, 'dc:creator'),
    subject: firstText(xml, 'dc:subject'),
    keywords: firstText(xml, 'cp:keywords'),
    created: firstText(xml, 'dcterms:created'),
    modified: firstText(xml, 'dcterms:modified'),
    lastModifiedBy: firstText(xml, 'cp:lastModifiedBy'),
  };
}

/**
 * Non-blank lines, trimmed
 */
export function compactLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
