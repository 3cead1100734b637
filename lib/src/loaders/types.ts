/**
 * Document Loader Types
 */

import { extname } from 'node:path';

import { KnowledgeBaseError, KnowledgeBaseErrorCode } from '../errors/index.js';

// =============================================================================
// File Formats
// =============================================================================

/**
 * Supported upload formats, resolved once from the file name
 */
export type FileFormat = { kind: 'pdf' } | { kind: 'docx' };

export const SUPPORTED_EXTENSIONS = ['.pdf', '.docx'] as const;

/**
 * Resolve the format from a file name's extension (case-insensitive).
 *
 * @throws {KnowledgeBaseError} UNSUPPORTED_FORMAT for any other extension
 */
export function resolveFormat(fileName: string): FileFormat {
  const extension = extname(fileName).toLowerCase();

  switch (extension) {
    case '.pdf':
      return { kind: 'pdf' };
    case '.docx':
      return { kind: 'docx' };
    default:
      throw new KnowledgeBaseError(
        `Unsupported file type${extension ? ` ${extension}` : ''}: only PDF and DOCX are accepted`,
        KnowledgeBaseErrorCode.UNSUPPORTED_FORMAT,
        { metadata: { fileName } }
      );
  }
}

export function isSupportedFile(fileName: string): boolean {
  const extension = extname(fileName).toLowerCase();
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

// =============================================================================
// Text Extractors
// =============================================================================

/** Text of each page, in page order */
export type PdfPageExtractor = (buffer: Buffer) => Promise<string[]>;

/** Raw text of the whole document */
export type DocxTextExtractor = (buffer: Buffer) => Promise<string>;

export interface TextExtractors {
  pdf: PdfPageExtractor;
  docx: DocxTextExtractor;
}
