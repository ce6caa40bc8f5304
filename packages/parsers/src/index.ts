/**
 * @fileclassify/parsers
 *
 * File content parsers used to give the classifier more than a file name.
 */

export {
  BaseParser,
  DEFAULT_SUMMARY_LENGTH,
  type FileInfo,
  type FileMetadata,
} from './base.js';

export { TextParser, decodeText, type DecodedText, type TextEncodingName } from './textParser.js';

export { PdfParser } from './pdfParser.js';
export { DocxParser } from './docxParser.js';
export { XlsxParser } from './xlsxParser.js';
export { PptxParser } from './pptxParser.js';
export { decodeXmlEntities, type CoreProperties } from './officeXml.js';

export { ParserFactory, type ParserConstructor } from './factory.js';
