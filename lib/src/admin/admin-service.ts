/**
 * Admin Service
 *
 * Knowledge base management: list, upload, delete, update and scrape.
 * Every failure surfaces as a KnowledgeBaseError.
 */

import { basename } from 'node:path';

import { type RawDocument, type UploadDocumentType, UploadDocumentTypeSchema } from '../documents/index.js';
import { KnowledgeBaseError, KnowledgeBaseErrorCode, toKnowledgeBaseError } from '../errors/index.js';
import { DocumentLoader, annotate } from '../loaders/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import type { IngestResult, SourceStats } from '../qdrant/index.js';
import type { BatchIngestResult, UrlIngestResult } from '../scraper/index.js';
import type {
  AdminScraper,
  AdminServiceDependencies,
  AdminVectorStore,
  SourceSummary,
  UpdateResult,
  UploadInput,
  UploadRequest,
  UploadResult,
} from './types.js';

interface PreparedUpload {
  source: string;
  documents: RawDocument[];
  request: UploadRequest;
}

export class AdminService {
  private readonly store: AdminVectorStore;
  private readonly scraper: AdminScraper;
  private readonly loader: Pick<DocumentLoader, 'load' | 'loadBuffer'>;
  private readonly logger: Logger;

  constructor(deps: AdminServiceDependencies) {
    this.store = deps.store;
    this.scraper = deps.scraper;
    this.logger = deps.logger ?? createLogger('admin');
    this.loader = deps.loader ?? new DocumentLoader(undefined, this.logger.child('loader'));
  }

  // ===========================================================================
  // Listing
  // ===========================================================================

  /**
   * One entry per source, sorted by name
   *
   * @throws {KnowledgeBaseError} STORAGE_FAILED or UPSTREAM_TIMEOUT
   */
  async listSources(): Promise<SourceSummary[]> {
    let stats: Map<string, SourceStats>;
    try {
      stats = await this.store.listBySource();
    } catch (error) {
      throw toKnowledgeBaseError(error, KnowledgeBaseErrorCode.STORAGE_FAILED);
    }

    return [...stats.entries()]
      .map(([name, entry]) => ({
        name,
        type: entry.type,
        date: entry.uploadDate,
        chunkCount: entry.chunkCount,
      }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  // ===========================================================================
  // Upload
  // ===========================================================================

  /**
   * Load, annotate, chunk and store a PDF or DOCX file.
   *
   * A partial storage failure is reported in `failed`; when nothing could
   * be stored the call fails.
   *
   * @throws {KnowledgeBaseError} INVALID_INPUT, UNSUPPORTED_FORMAT,
   *   STORAGE_FAILED or UPSTREAM_TIMEOUT
   */
  async uploadDocument(
    input: UploadInput,
    docType: UploadDocumentType,
    sourceName?: string
  ): Promise<UploadResult> {
    const prepared = await this.prepare({ input, docType, sourceName });
    return this.storePrepared(prepared);
  }

  // ===========================================================================
  // Delete & Update
  // ===========================================================================

  /**
   * Remove every record of a source. An unknown source is not an error.
   *
   * @throws {KnowledgeBaseError} INVALID_INPUT, STORAGE_FAILED or UPSTREAM_TIMEOUT
   */
  async deleteSource(name: string): Promise<void> {
    const source = requireName(name, 'Source name');
    try {
      await this.store.deleteBySource(source);
    } catch (error) {
      throw toKnowledgeBaseError(error, KnowledgeBaseErrorCode.STORAGE_FAILED);
    }
  }

  /**
   * Replace a source with a new upload: delete the old records, then store
   * the new file. The file is read before anything is deleted, but a store
   * failure after the delete is not rolled back and leaves the old source
   * removed.
   *
   * @throws {KnowledgeBaseError} NOT_FOUND when `oldName` has no records, plus
   *   every error of `uploadDocument`
   */
  async updateDocument(oldName: string, request: UploadRequest): Promise<UpdateResult> {
    const replaced = requireName(oldName, 'Old source name');

    let existing: number;
    try {
      existing = await this.store.countBySource(replaced);
    } catch (error) {
      throw toKnowledgeBaseError(error, KnowledgeBaseErrorCode.STORAGE_FAILED);
    }

    if (existing === 0) {
      throw new KnowledgeBaseError(
        `No records found for ${replaced}`,
        KnowledgeBaseErrorCode.NOT_FOUND,
        { metadata: { source: replaced } }
      );
    }

    const prepared = await this.prepare(request);
    await this.deleteSource(replaced);
    this.logger.info('Deleted source for update', { source: replaced, removedCount: existing });

    const result = await this.storePrepared(prepared);
    return { ...result, replaced, removedCount: existing };
  }

  // ===========================================================================
  // Scraping
  // ===========================================================================

  scrapeUrl(url: string, force = false): Promise<UrlIngestResult> {
    return this.scraper.ingest(url, force);
  }

  scrapeUrls(urls: string | readonly string[], force = false): Promise<BatchIngestResult> {
    return this.scraper.ingestMany(urls, force);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async prepare(request: UploadRequest): Promise<PreparedUpload> {
    const docType = UploadDocumentTypeSchema.safeParse(request.docType);
    if (!docType.success) {
      throw new KnowledgeBaseError(
        `Invalid document type: ${String(request.docType)}`,
        KnowledgeBaseErrorCode.INVALID_INPUT
      );
    }

    const fileName = uploadFileName(request.input);
    const source = request.sourceName?.trim() || basename(fileName);

    let documents: RawDocument[];
    try {
      documents =
        typeof request.input === 'string'
          ? await this.loader.load(request.input)
          : await this.loader.loadBuffer(request.input.buffer, request.input.fileName);
    } catch (error) {
      throw toKnowledgeBaseError(error, KnowledgeBaseErrorCode.UNSUPPORTED_FORMAT, `Failed to read ${fileName}`);
    }

    return { source, documents, request: { ...request, docType: docType.data } };
  }

  private async storePrepared(prepared: PreparedUpload): Promise<UploadResult> {
    const { source, documents, request } = prepared;
    const annotated = annotate(documents, source, request.docType);

    let result: IngestResult;
    try {
      result = await this.store.ingest(annotated);
    } catch (error) {
      throw toKnowledgeBaseError(error, KnowledgeBaseErrorCode.STORAGE_FAILED, `Failed to store ${source}`);
    }

    const firstFailure = result.failed[0];
    if (result.storedCount === 0 && firstFailure) {
      throw toKnowledgeBaseError(
        firstFailure.error,
        KnowledgeBaseErrorCode.STORAGE_FAILED,
        `Failed to store ${source}`
      );
    }

    this.logger.info('Uploaded document', {
      source,
      type: request.docType,
      documents: documents.length,
      chunks: result.chunkCount,
      stored: result.storedCount,
      failed: result.failed.length,
    });

    return {
      source,
      documentCount: documents.length,
      chunkCount: result.chunkCount,
      storedCount: result.storedCount,
      failed: result.failed,
    };
  }
}

function uploadFileName(input: UploadInput): string {
  return typeof input === 'string' ? input : input.fileName;
}

function requireName(value: string, label: string): string {
  const name = value.trim();
  if (name.length === 0) {
    throw new KnowledgeBaseError(`${label} must not be empty`, KnowledgeBaseErrorCode.INVALID_INPUT);
  }
  return name;
}

export function createAdminService(deps: AdminServiceDependencies): AdminService {
  return new AdminService(deps);
}
