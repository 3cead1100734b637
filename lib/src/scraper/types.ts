/**
 * Web Scraper Types
 */

import { z } from 'zod';

import type { KnowledgeBaseErrorCode } from '../errors/index.js';
import type { FailedChunk } from '../qdrant/index.js';

// =============================================================================
// Error Types
// =============================================================================

export const ScraperErrorCode = {
  /** Response carried no markdown */
  NO_CONTENT: 'NO_CONTENT',
  /** Non-2xx status or an error body */
  HTTP_ERROR: 'HTTP_ERROR',
  /** Request exceeded its timeout */
  TIMEOUT: 'TIMEOUT',
  /** Connection failed before a response */
  NETWORK_ERROR: 'NETWORK_ERROR',
  /** No API key configured */
  NOT_CONFIGURED: 'NOT_CONFIGURED',
} as const;

export type ScraperErrorCode = (typeof ScraperErrorCode)[keyof typeof ScraperErrorCode];

export class ScraperError extends Error {
  readonly code: ScraperErrorCode;
  readonly status: number | undefined;
  override readonly cause: Error | undefined;

  constructor(
    message: string,
    code: ScraperErrorCode,
    options?: { status?: number | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'ScraperError';
    this.code = code;
    this.status = options?.status;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ScraperError);
    }
  }
}

export function isScraperError(error: unknown): error is ScraperError {
  return error instanceof ScraperError;
}

// =============================================================================
// Response Normalisation
// =============================================================================

/**
 * Scrape responses arrive either as `{ data: { markdown } }` or with
 * `markdown` at the top level, depending on API version.
 */
export const ScrapeResponseSchema = z
  .object({
    success: z.boolean().optional(),
    error: z.string().optional(),
    markdown: z.string().nullish(),
    data: z
      .object({
        markdown: z.string().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type ScrapeResponse = z.infer<typeof ScrapeResponseSchema>;

export interface NormalizedScrape {
  markdown: string | undefined;
  error: string | undefined;
}

export function normalizeScrapeResponse(body: unknown): NormalizedScrape {
  const parsed = ScrapeResponseSchema.safeParse(body);
  if (!parsed.success) {
    return { markdown: undefined, error: 'Unexpected response shape' };
  }

  const markdown = parsed.data.data?.markdown ?? parsed.data.markdown ?? undefined;
  const error =
    parsed.data.error ?? (parsed.data.success === false ? 'Scrape reported failure' : undefined);

  return { markdown: markdown && markdown.length > 0 ? markdown : undefined, error };
}

/**
 * Anything that turns a URL into markdown
 */
export interface ScrapeClient {
  scrape(url: string): Promise<string>;
}

// =============================================================================
// Ingestion Results
// =============================================================================

export interface UrlIngestResult {
  url: string;
  chunkCount: number;
  storedCount: number;
  failed: FailedChunk[];
}

export interface UrlIngestFailure {
  url: string;
  code: KnowledgeBaseErrorCode;
  message: string;
}

export interface BatchIngestResult {
  succeeded: UrlIngestResult[];
  failed: UrlIngestFailure[];
}

/**
 * Split newline-separated URL text into trimmed, non-blank entries
 */
export function parseUrlList(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
