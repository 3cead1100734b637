/**
 * Vector Store Service
 *
 * Knowledge base operations over one Qdrant collection: chunk and store
 * documents, list and count by source, delete by source and search by
 * query text.
 */

import type { QdrantClient } from '@qdrant/js-client-rest';

import { RecursiveTextSplitter } from '../chunking/index.js';
import type { Chunk, Document } from '../documents/index.js';
import { type Embedder, OpenAIEmbedder, toBatches } from '../embeddings/index.js';
import { isTimeoutError } from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import { getQdrantClient } from './client.js';
import { SOURCE_FIELD } from './config.js';
import {
  type FailedChunk,
  type RetrievedChunk,
  type SourceStats,
  type StoreResult,
  type VectorStoreServiceConfig,
  VectorStoreError,
  VectorStoreErrorCode,
  createDefaultVectorStoreConfig,
  formatPayloadForQdrant,
  generatePointId,
  parsePayloadFromQdrant,
  readListingFields,
} from './types.js';

export interface VectorStoreDependencies {
  /** Defaults to the environment-configured singleton */
  client?: QdrantClient | undefined;
  /** Defaults to an OpenAI embedder with the configured dimensions */
  embedder?: Embedder | undefined;
  logger?: Logger | undefined;
}

export interface IngestResult extends StoreResult {
  chunkCount: number;
}

// =============================================================================
// VectorStoreService Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const store = new VectorStoreService({ collectionName: 'hr_documents' });
 *
 * const chunks = store.chunk(documents);
 * const { storedCount, failed } = await store.store(chunks);
 *
 * const sources = await store.listBySource();
 * const hits = await store.search('How much parental leave do we offer?', 5);
 * ```
 */
export class VectorStoreService {
  private readonly client: QdrantClient;
  private readonly embedder: Embedder;
  private readonly config: VectorStoreServiceConfig;
  private readonly collectionName: string;
  private readonly logger: Logger;

  constructor(config?: Partial<VectorStoreServiceConfig>, deps: VectorStoreDependencies = {}) {
    this.config = createDefaultVectorStoreConfig(config);
    this.collectionName = this.config.collectionName;
    this.client = deps.client ?? getQdrantClient();
    this.embedder =
      deps.embedder ?? new OpenAIEmbedder({ dimensions: this.config.vectorDimensions });
    this.logger = deps.logger ?? createLogger('vector-store');
  }

  getConfig(): Readonly<VectorStoreServiceConfig> {
    return { ...this.config };
  }

  // ===========================================================================
  // Chunking and Storage
  // ===========================================================================

  /**
   * Split documents into chunks; sizes default to the service configuration
   */
  chunk(documents: readonly Document[], chunkSize?: number, chunkOverlap?: number): Chunk[] {
    const splitter = new RecursiveTextSplitter({
      chunkSize: chunkSize ?? this.config.chunkSize,
      chunkOverlap: chunkOverlap ?? this.config.chunkOverlap,
    });
    return splitter.splitDocuments(documents);
  }

  /**
   * Embed and upsert chunks batch by batch. A batch that fails to embed or
   * upsert is reported chunk by chunk; earlier and later batches are kept.
   */
  async store(chunks: readonly Chunk[]): Promise<StoreResult> {
    const startTime = performance.now();
    const failed: FailedChunk[] = [];
    let storedCount = 0;

    const batchSize = this.config.batchSize ?? this.embedder.batchSize;

    for (const batch of toBatches(chunks, batchSize)) {
      let vectors: number[][];
      try {
        vectors = await this.embedder.embedDocuments(batch.map((chunk) => chunk.content));
        if (vectors.length !== batch.length) {
          throw new VectorStoreError(
            `Embedding failed: expected ${batch.length} vectors, got ${vectors.length}`,
            VectorStoreErrorCode.EMBEDDING_FAILED
          );
        }
      } catch (error) {
        const wrapped = this.wrapError(error, 'Embedding failed', VectorStoreErrorCode.EMBEDDING_FAILED);
        this.logger.warn('Embedding batch failed', { size: batch.length, error: wrapped.message });
        failed.push(...batch.map((chunk) => ({ chunk, reason: wrapped.message, error: wrapped })));
        continue;
      }

      const points: Array<{ id: string; vector: number[]; payload: Record<string, unknown> }> = [];
      batch.forEach((chunk, index) => {
        const vector = vectors[index];
        if (vector) {
          points.push({ id: generatePointId(), vector, payload: formatPayloadForQdrant(chunk) });
        }
      });

      try {
        await this.client.upsert(this.collectionName, { wait: true, points });
        storedCount += points.length;
      } catch (error) {
        const wrapped = this.wrapError(error, 'Upsert failed');
        this.logger.warn('Upsert batch failed', { size: batch.length, error: wrapped.message });
        failed.push(...batch.map((chunk) => ({ chunk, reason: wrapped.message, error: wrapped })));
      }
    }

    const durationMs = performance.now() - startTime;

    this.logger.info('Stored chunks', {
      storedCount,
      failedCount: failed.length,
      durationMs: Math.round(durationMs),
    });

    return { storedCount, failed, durationMs };
  }

  /**
   * Chunk then store documents
   */
  async ingest(documents: readonly Document[]): Promise<IngestResult> {
    const chunks = this.chunk(documents);
    const result = await this.store(chunks);
    return { ...result, chunkCount: chunks.length };
  }

  // ===========================================================================
  // Listing and Counting
  // ===========================================================================

  /**
   * Group every stored record by `metadata.source`. Scrolls page by page
   * until the cursor is exhausted. Missing metadata is grouped as `Unknown`.
   */
  async listBySource(): Promise<Map<string, SourceStats>> {
    const sources = new Map<string, SourceStats>();
    let offset: string | number | undefined;
    let pages = 0;

    try {
      do {
        const page = await this.client.scroll(this.collectionName, {
          limit: this.config.scrollPageSize,
          with_payload: true,
          with_vector: false,
          ...(offset !== undefined && { offset }),
        });
        pages++;

        for (const point of page.points) {
          const fields = readListingFields(point.payload);
          const existing = sources.get(fields.source);
          if (existing) {
            existing.chunkCount++;
          } else {
            sources.set(fields.source, {
              type: fields.type,
              uploadDate: fields.uploadDate,
              chunkCount: 1,
            });
          }
        }

        offset = toPointOffset(page.next_page_offset);
      } while (offset !== undefined);
    } catch (error) {
      throw this.wrapError(error, 'Failed to list sources');
    }

    this.logger.debug('Listed sources', { sources: sources.size, pages });
    return sources;
  }

  async countBySource(source: string): Promise<number> {
    try {
      const result = await this.client.count(this.collectionName, {
        filter: sourceFilter(source),
        exact: true,
      });
      return result.count;
    } catch (error) {
      throw this.wrapError(error, `Failed to count records for ${source}`);
    }
  }

  // ===========================================================================
  // Deletion
  // ===========================================================================

  /**
   * Delete every record of a source. A source with no records is not an error.
   */
  async deleteBySource(source: string): Promise<void> {
    try {
      await this.client.delete(this.collectionName, {
        filter: sourceFilter(source),
        wait: true,
      });
    } catch (error) {
      throw this.wrapError(error, `Failed to delete ${source}`);
    }
    this.logger.info('Deleted source', { source });
  }

  // ===========================================================================
  // Search
  // ===========================================================================

  /**
   * Embed the query and return the `k` nearest chunks
   */
  async search(query: string, k: number = this.config.defaultSearchLimit): Promise<RetrievedChunk[]> {
    let vector: number[];
    try {
      vector = await this.embedder.embedQuery(query);
    } catch (error) {
      throw this.wrapError(error, 'Query embedding failed', VectorStoreErrorCode.EMBEDDING_FAILED);
    }

    if (vector.length !== this.config.vectorDimensions) {
      throw new VectorStoreError(
        `Vector dimension mismatch: expected ${this.config.vectorDimensions}, got ${vector.length}`,
        VectorStoreErrorCode.DIMENSION_MISMATCH
      );
    }

    try {
      const hits = await this.client.search(this.collectionName, {
        vector,
        limit: k,
        with_payload: true,
      });

      const results: RetrievedChunk[] = [];
      for (const hit of hits) {
        const payload = parsePayloadFromQdrant(hit.payload);
        if (!payload) {
          this.logger.debug('Skipping point with unexpected payload', { id: hit.id });
          continue;
        }
        results.push({ content: payload.content, metadata: payload.metadata, score: hit.score });
      }
      return results;
    } catch (error) {
      throw this.wrapError(error, 'Search operation failed');
    }
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private wrapError(
    error: unknown,
    context: string,
    fallbackCode: VectorStoreErrorCode = VectorStoreErrorCode.UNKNOWN
  ): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    let code: VectorStoreErrorCode = fallbackCode;

    if (isTimeoutError(error)) {
      code = VectorStoreErrorCode.TIMEOUT;
    } else if (message.includes('ECONNREFUSED') || message.toLowerCase().includes('fetch failed')) {
      code = VectorStoreErrorCode.CONNECTION_ERROR;
    } else if (message.includes('Not found') && message.includes('Collection')) {
      code = VectorStoreErrorCode.COLLECTION_NOT_FOUND;
    } else if (message.includes('dimension')) {
      code = VectorStoreErrorCode.DIMENSION_MISMATCH;
    }

    return new VectorStoreError(`${context}: ${message}`, code, { cause });
  }
}

// =============================================================================
// Filters
// =============================================================================

function sourceFilter(source: string): { must: Array<{ key: string; match: { value: string } }> } {
  return { must: [{ key: SOURCE_FIELD, match: { value: source } }] };
}

function toPointOffset(value: unknown): string | number | undefined {
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createVectorStoreService(
  config?: Partial<VectorStoreServiceConfig>,
  deps?: VectorStoreDependencies
): VectorStoreService {
  return new VectorStoreService(config, deps);
}
