/**
 * DOCX Text Extraction
 */

import mammoth from 'mammoth';

import { KnowledgeBaseError, KnowledgeBaseErrorCode } from '../errors/index.js';
import type { DocxTextExtractor } from './types.js';

/**
 * Extract the raw text of a Word document. Formatting, tables and images
 * are flattened or dropped.
 *
 * @throws {KnowledgeBaseError} UNSUPPORTED_FORMAT when the bytes are not a readable DOCX
 */
export const extractDocxText: DocxTextExtractor = async (buffer) => {
  if (buffer.length === 0) {
    throw new KnowledgeBaseError('DOCX file is empty', KnowledgeBaseErrorCode.UNSUPPORTED_FORMAT);
  }

  try {
    const result = await mammoth.extractRawText({ buffer });
    return result.value;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new KnowledgeBaseError(
      `Invalid or corrupted DOCX: ${message}`,
      KnowledgeBaseErrorCode.UNSUPPORTED_FORMAT,
      error instanceof Error ? { cause: error } : undefined
    );
  }
};
