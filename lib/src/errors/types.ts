/**
 * Knowledge Base Error Taxonomy
 *
 * The failure kinds callers of the assistant can distinguish. Lower layers
 * (vector store, embeddings, LLM, scraper) raise their own typed errors;
 * `toKnowledgeBaseError` folds them into this taxonomy at the service boundary.
 */

// =============================================================================
// Error Codes
// =============================================================================

export const KnowledgeBaseErrorCode = {
  /** File extension or content is not a readable PDF/DOCX */
  UNSUPPORTED_FORMAT: 'UNSUPPORTED_FORMAT',
  /** Scraping provider returned no content or an error */
  SCRAPE_FAILED: 'SCRAPE_FAILED',
  /** URL already has stored chunks and force was not set */
  ALREADY_INGESTED: 'ALREADY_INGESTED',
  /** Write, list or delete against the vector store failed */
  STORAGE_FAILED: 'STORAGE_FAILED',
  /** An external call exceeded its timeout */
  UPSTREAM_TIMEOUT: 'UPSTREAM_TIMEOUT',
  /** Embedding or completion failed while answering */
  GENERATION_FAILED: 'GENERATION_FAILED',
  /** Update target has no stored records */
  NOT_FOUND: 'NOT_FOUND',
  /** Caller input rejected before any external call */
  INVALID_INPUT: 'INVALID_INPUT',
} as const;

export type KnowledgeBaseErrorCode =
  (typeof KnowledgeBaseErrorCode)[keyof typeof KnowledgeBaseErrorCode];

// =============================================================================
// Error Class
// =============================================================================

export class KnowledgeBaseError extends Error {
  readonly code: KnowledgeBaseErrorCode;
  override readonly cause: Error | undefined;
  readonly metadata: Record<string, unknown> | undefined;

  constructor(
    message: string,
    code: KnowledgeBaseErrorCode,
    options?: { cause?: Error; metadata?: Record<string, unknown> }
  ) {
    super(message);
    this.name = 'KnowledgeBaseError';
    this.code = code;
    this.cause = options?.cause;
    this.metadata = options?.metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, KnowledgeBaseError);
    }
  }
}

export function isKnowledgeBaseError(error: unknown): error is KnowledgeBaseError {
  return error instanceof KnowledgeBaseError;
}

// =============================================================================
// Mapping
// =============================================================================

const TIMEOUT_CODES = new Set([
  'TIMEOUT',
  'timeout',
  'UPSTREAM_TIMEOUT',
  'ECONNABORTED',
  'ETIMEDOUT',
]);

const TIMEOUT_NAMES = new Set([
  'TimeoutError',
  'AbortError',
  'APIConnectionTimeoutError',
  'QdrantClientTimeoutError',
]);

/**
 * Whether an error from any layer represents an exceeded timeout
 */
export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('code' in error && typeof error.code === 'string' && TIMEOUT_CODES.has(error.code)) {
    return true;
  }
  if (TIMEOUT_NAMES.has(error.name)) {
    return true;
  }
  return error.cause !== undefined && error.cause !== error && isTimeoutError(error.cause);
}

/**
 * Fold any error into the taxonomy. Timeouts always become UPSTREAM_TIMEOUT;
 * other errors take the fallback code. KnowledgeBaseErrors pass through.
 */
export function toKnowledgeBaseError(
  error: unknown,
  fallbackCode: KnowledgeBaseErrorCode,
  context?: string
): KnowledgeBaseError {
  if (error instanceof KnowledgeBaseError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  const code = isTimeoutError(error) ? KnowledgeBaseErrorCode.UPSTREAM_TIMEOUT : fallbackCode;

  return new KnowledgeBaseError(
    context ? `${context}: ${message}` : message,
    code,
    cause ? { cause } : undefined
  );
}
