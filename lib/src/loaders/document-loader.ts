/**
 * Document Loader
 *
 * Turns PDF and DOCX files into page-level documents. A PDF yields one
 * document per page with text; a DOCX yields a single document.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import {
  type Document,
  type DocumentType,
  type RawDocument,
  formatUploadDate,
} from '../documents/index.js';
import { KnowledgeBaseError, KnowledgeBaseErrorCode } from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import { extractDocxText } from './docx-loader.js';
import { extractPdfPages } from './pdf-loader.js';
import { type FileFormat, type TextExtractors, resolveFormat } from './types.js';

export class DocumentLoader {
  private readonly extractors: TextExtractors;
  private readonly logger: Logger;

  constructor(extractors?: Partial<TextExtractors>, logger?: Logger) {
    this.extractors = {
      pdf: extractors?.pdf ?? extractPdfPages,
      docx: extractors?.docx ?? extractDocxText,
    };
    this.logger = logger ?? createLogger('loader');
  }

  /**
   * Load a file from disk.
   *
   * @throws {KnowledgeBaseError} UNSUPPORTED_FORMAT for other extensions or unreadable content
   */
  async load(path: string): Promise<RawDocument[]> {
    const format = resolveFormat(path);
    const buffer = await readFile(path);
    return this.extract(buffer, basename(path), format);
  }

  /**
   * Load an in-memory upload; the format comes from `fileName`
   */
  async loadBuffer(buffer: Buffer, fileName: string): Promise<RawDocument[]> {
    const format = resolveFormat(fileName);
    return this.extract(buffer, basename(fileName), format);
  }

  private async extract(buffer: Buffer, origin: string, format: FileFormat): Promise<RawDocument[]> {
    let documents: RawDocument[];

    switch (format.kind) {
      case 'pdf': {
        const pages = await this.extractors.pdf(buffer);
        documents = [];
        pages.forEach((text, index) => {
          if (text.trim().length > 0) {
            documents.push({ content: text, metadata: { origin, page: index + 1 } });
          }
        });
        break;
      }
      case 'docx': {
        const text = await this.extractors.docx(buffer);
        documents = text.trim().length > 0 ? [{ content: text, metadata: { origin } }] : [];
        break;
      }
    }

    if (documents.length === 0) {
      throw new KnowledgeBaseError(
        `${origin} contains no extractable text`,
        KnowledgeBaseErrorCode.UNSUPPORTED_FORMAT,
        { metadata: { fileName: origin } }
      );
    }

    this.logger.debug('Loaded document', { origin, format: format.kind, documents: documents.length });
    return documents;
  }
}

/**
 * Stamp source name, type and upload date on loaded documents. The date
 * defaults to today (YYYY-MM-DD).
 */
export function annotate(
  documents: readonly RawDocument[],
  sourceName: string,
  docType: DocumentType,
  date: string = formatUploadDate()
): Document[] {
  return documents.map((document) => ({
    content: document.content,
    metadata: {
      source: sourceName,
      type: docType,
      upload_date: date,
      ...(document.metadata.page !== undefined && { page: document.metadata.page }),
    },
  }));
}
