/**
 * Embedding Types and Schemas
 *
 * Types for turning chunk and query text into vectors through the
 * provider's embeddings endpoint.
 */

import { z } from 'zod';

// =============================================================================
// Embedding Models
// =============================================================================

export const EmbeddingModel = {
  TEXT_EMBEDDING_3_SMALL: 'text-embedding-3-small',
  TEXT_EMBEDDING_3_LARGE: 'text-embedding-3-large',
} as const;

export type EmbeddingModel = (typeof EmbeddingModel)[keyof typeof EmbeddingModel];

export const DEFAULT_EMBEDDING_MODEL = EmbeddingModel.TEXT_EMBEDDING_3_SMALL;

// =============================================================================
// Embedder Configuration
// =============================================================================

export const EmbedderConfigSchema = z.object({
  /** Model identifier; any model name the provider accepts */
  model: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  /**
   * Output vector size. Must match the vector store collection.
   * @default 1536
   */
  dimensions: z.number().int().positive().default(1536),
  /** Texts per embeddings request */
  batchSize: z.number().int().positive().max(2048).default(64),
  /** Request timeout in milliseconds */
  timeoutMs: z.number().int().positive().default(60_000),
});

export type EmbedderConfig = z.infer<typeof EmbedderConfigSchema>;

export function createDefaultEmbedderConfig(
  overrides?: Partial<EmbedderConfig>
): EmbedderConfig {
  return EmbedderConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Embedder Interface
// =============================================================================

/**
 * What the vector store and RAG chain need from an embedder
 */
export interface Embedder {
  /** Embed one query string */
  embedQuery(text: string): Promise<number[]>;
  /** Embed many texts; the result order matches the input order */
  embedDocuments(texts: readonly string[]): Promise<number[][]>;
  /** Vector size produced by this embedder */
  readonly dimensions: number;
  /** Texts per request; callers batch their inputs by this size */
  readonly batchSize: number;
}

// =============================================================================
// Error Types
// =============================================================================

export const EmbeddingErrorCode = {
  /** Input text was empty */
  EMPTY_INPUT: 'EMPTY_INPUT',
  /** Returned vector size differs from the configured dimensions */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  /** Provider returned fewer vectors than inputs */
  INCOMPLETE_RESPONSE: 'INCOMPLETE_RESPONSE',
  /** Request timed out */
  TIMEOUT: 'TIMEOUT',
  /** Provider rejected or failed the request */
  PROVIDER_ERROR: 'PROVIDER_ERROR',
  UNKNOWN: 'UNKNOWN',
} as const;

export type EmbeddingErrorCode =
  (typeof EmbeddingErrorCode)[keyof typeof EmbeddingErrorCode];

export class EmbeddingError extends Error {
  readonly code: EmbeddingErrorCode;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: EmbeddingErrorCode,
    options?: { cause?: Error }
  ) {
    super(message);
    this.name = 'EmbeddingError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingError);
    }
  }

  static fromError(error: unknown, code?: EmbeddingErrorCode): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;

    return new EmbeddingError(
      message,
      code ?? EmbeddingErrorCode.UNKNOWN,
      cause ? { cause } : undefined
    );
  }
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Throw if a vector does not have the expected size
 */
export function assertDimensions(vector: readonly number[], expected: number): void {
  if (vector.length !== expected) {
    throw new EmbeddingError(
      `Embedding dimension mismatch: expected ${expected}, got ${vector.length}`,
      EmbeddingErrorCode.DIMENSION_MISMATCH
    );
  }
}

/**
 * Split items into consecutive batches of at most `size`
 */
export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
