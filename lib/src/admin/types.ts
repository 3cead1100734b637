/**
 * Admin Operation Types
 */

import type { DocumentLoader } from '../loaders/index.js';
import type { Logger } from '../logging/index.js';
import type { FailedChunk, VectorStoreService } from '../qdrant/index.js';
import type { WebScraper } from '../scraper/index.js';
import type { UploadDocumentType } from '../documents/index.js';

export type AdminVectorStore = Pick<
  VectorStoreService,
  'ingest' | 'listBySource' | 'countBySource' | 'deleteBySource'
>;

export type AdminScraper = Pick<WebScraper, 'ingest' | 'ingestMany'>;

export interface AdminServiceDependencies {
  store: AdminVectorStore;
  scraper: AdminScraper;
  /** Defaults to a loader with the pdf-parse and mammoth extractors */
  loader?: Pick<DocumentLoader, 'load' | 'loadBuffer'> | undefined;
  logger?: Logger | undefined;
}

/** One row of the knowledge base listing */
export interface SourceSummary {
  name: string;
  /** Document type, or `Unknown` when the records carry none */
  type: string;
  date: string;
  chunkCount: number;
}

export interface BufferUpload {
  buffer: Buffer;
  fileName: string;
}

/** A path on disk or an in-memory file */
export type UploadInput = string | BufferUpload;

export interface UploadRequest {
  input: UploadInput;
  docType: UploadDocumentType;
  /** Defaults to the file's base name */
  sourceName?: string | undefined;
}

export interface UploadResult {
  source: string;
  /** Pages (PDF) or files (DOCX) with text */
  documentCount: number;
  chunkCount: number;
  storedCount: number;
  failed: FailedChunk[];
}

export interface UpdateResult extends UploadResult {
  replaced: string;
  removedCount: number;
}

export const ConnectionService = {
  OPENAI: 'openai',
  QDRANT: 'qdrant',
  FIRECRAWL: 'firecrawl',
} as const;

export type ConnectionService = (typeof ConnectionService)[keyof typeof ConnectionService];

export interface ConnectionCheck {
  service: ConnectionService;
  ok: boolean;
  detail: string;
  latencyMs: number;
}
