/**
 * PDF Text Extraction
 *
 * Per-page text through pdf-parse. The library entry point is loaded from
 * `lib/pdf-parse.js`: its package index runs a self-test against a bundled
 * sample file when imported as an ES module.
 */

import { createRequire } from 'node:module';

import type pdfParse from 'pdf-parse';

import { KnowledgeBaseError, KnowledgeBaseErrorCode } from '../errors/index.js';
import type { PdfPageExtractor } from './types.js';

interface PdfTextItem {
  str: string;
  transform: number[];
}

interface PdfPageProxy {
  getTextContent(options: {
    normalizeWhitespace: boolean;
    disableCombineTextItems: boolean;
  }): Promise<{ items: PdfTextItem[] }>;
}

type PdfParseFunction = (
  data: Buffer,
  options?: { pagerender?: (page: PdfPageProxy) => Promise<string>; max?: number }
) => Promise<pdfParse.Result>;

const require = createRequire(import.meta.url);

let parser: PdfParseFunction | null = null;

function getParser(): PdfParseFunction {
  if (parser) {
    return parser;
  }
  const loaded: PdfParseFunction = require('pdf-parse/lib/pdf-parse.js');
  parser = loaded;
  return loaded;
}

/**
 * Join a page's text items, starting a new line whenever the vertical
 * position changes
 */
export function renderPageText(items: readonly PdfTextItem[]): string {
  let text = '';
  let lastY: number | undefined;

  for (const item of items) {
    const y = item.transform[5];
    if (lastY !== undefined && y !== lastY) {
      text += '\n';
    }
    text += item.str;
    lastY = y;
  }

  return text;
}

/**
 * Extract the text of every page.
 *
 * @throws {KnowledgeBaseError} UNSUPPORTED_FORMAT when the bytes are not a readable PDF
 */
export const extractPdfPages: PdfPageExtractor = async (buffer) => {
  if (buffer.length === 0) {
    throw new KnowledgeBaseError('PDF file is empty', KnowledgeBaseErrorCode.UNSUPPORTED_FORMAT);
  }

  if (!buffer.subarray(0, 5).toString('ascii').startsWith('%PDF-')) {
    throw new KnowledgeBaseError(
      'Invalid PDF: file does not start with PDF header',
      KnowledgeBaseErrorCode.UNSUPPORTED_FORMAT
    );
  }

  const pages: string[] = [];

  try {
    // pdf-parse renders pages one after another, so push order is page order
    await getParser()(buffer, {
      pagerender: async (page) => {
        const content = await page.getTextContent({
          normalizeWhitespace: false,
          disableCombineTextItems: false,
        });
        const text = renderPageText(content.items);
        pages.push(text);
        return text;
      },
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new KnowledgeBaseError(
      `Invalid or corrupted PDF: ${message}`,
      KnowledgeBaseErrorCode.UNSUPPORTED_FORMAT,
      error instanceof Error ? { cause: error } : undefined
    );
  }

  return pages;
};
