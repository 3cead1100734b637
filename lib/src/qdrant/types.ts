/**
 * Vector Store Types
 *
 * Payload layout, operation results and errors for the Qdrant-backed
 * knowledge base.
 */

import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import {
  type Chunk,
  type DocumentMetadata,
  DocumentMetadataSchema,
} from '../documents/index.js';

// =============================================================================
// Error Types
// =============================================================================

export const VectorStoreErrorCode = {
  /** Connection to Qdrant failed */
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  /** Collection not found */
  COLLECTION_NOT_FOUND: 'COLLECTION_NOT_FOUND',
  /** Invalid vector dimensions */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  /** Embedding the chunk or query text failed */
  EMBEDDING_FAILED: 'EMBEDDING_FAILED',
  /** Operation timed out */
  TIMEOUT: 'TIMEOUT',
  UNKNOWN: 'UNKNOWN',
} as const;

export type VectorStoreErrorCode =
  (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode];

export class VectorStoreError extends Error {
  readonly code: VectorStoreErrorCode;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: VectorStoreErrorCode,
    options?: { cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'VectorStoreError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VectorStoreError);
    }
  }
}

export function isVectorStoreError(error: unknown): error is VectorStoreError {
  return error instanceof VectorStoreError;
}

// =============================================================================
// Payload
// =============================================================================

/**
 * Stored point payload: `{ content, metadata: { source, type, upload_date, page? } }`
 */
export const ChunkPayloadSchema = z.object({
  content: z.string(),
  metadata: DocumentMetadataSchema,
});

export type ChunkPayload = z.infer<typeof ChunkPayloadSchema>;

/**
 * Lenient view used when listing: records written by other tools may lack
 * any of these fields.
 */
const ListingPayloadSchema = z.object({
  metadata: z
    .object({
      source: z.string().optional(),
      type: z.string().optional(),
      upload_date: z.string().optional(),
    })
    .optional(),
});

export const UNKNOWN_VALUE = 'Unknown';

export function formatPayloadForQdrant(chunk: Chunk): Record<string, unknown> {
  const metadata: DocumentMetadata = {
    source: chunk.metadata.source,
    type: chunk.metadata.type,
    upload_date: chunk.metadata.upload_date,
    ...(chunk.metadata.page !== undefined && { page: chunk.metadata.page }),
  };
  return { content: chunk.content, metadata };
}

/**
 * Parse a stored payload; undefined when it does not have the expected shape
 */
export function parsePayloadFromQdrant(
  payload: Record<string, unknown> | null | undefined
): ChunkPayload | undefined {
  const result = ChunkPayloadSchema.safeParse(payload);
  return result.success ? result.data : undefined;
}

/**
 * Listing fields of a payload, with `Unknown` for whatever is missing
 */
export function readListingFields(payload: Record<string, unknown> | null | undefined): {
  source: string;
  type: string;
  uploadDate: string;
} {
  const parsed = ListingPayloadSchema.safeParse(payload ?? {});
  const metadata = parsed.success ? parsed.data.metadata : undefined;
  return {
    source: metadata?.source ?? UNKNOWN_VALUE,
    type: metadata?.type ?? UNKNOWN_VALUE,
    uploadDate: metadata?.upload_date ?? UNKNOWN_VALUE,
  };
}

// =============================================================================
// Results
// =============================================================================

export interface FailedChunk {
  chunk: Chunk;
  reason: string;
  error: VectorStoreError;
}

export interface StoreResult {
  storedCount: number;
  failed: FailedChunk[];
  durationMs: number;
}

export interface SourceStats {
  type: string;
  uploadDate: string;
  chunkCount: number;
}

export interface RetrievedChunk {
  content: string;
  metadata: DocumentMetadata;
  score: number;
}

// =============================================================================
// Service Configuration
// =============================================================================

export const VectorStoreServiceConfigSchema = z
  .object({
    collectionName: z.string().min(1).default('hr_documents'),
    vectorDimensions: z.number().int().positive().default(1536),
    /** Chunks embedded and upserted per request; defaults to the embedder's batch size */
    batchSize: z.number().int().positive().optional(),
    /** Points per scroll page when listing */
    scrollPageSize: z.number().int().positive().default(1000),
    chunkSize: z.number().int().positive().default(1000),
    chunkOverlap: z.number().int().nonnegative().default(200),
    defaultSearchLimit: z.number().int().positive().default(5),
  })
  .refine((config) => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type VectorStoreServiceConfig = z.infer<typeof VectorStoreServiceConfigSchema>;

export function createDefaultVectorStoreConfig(
  overrides?: Partial<VectorStoreServiceConfig>
): VectorStoreServiceConfig {
  return VectorStoreServiceConfigSchema.parse(overrides ?? {});
}

export function generatePointId(): string {
  return randomUUID();
}
