/**
 * Web Scraper
 *
 * Fetches pages as markdown and stores each as one `webpage` document.
 * A URL that already has stored chunks is refused unless `force` is set.
 */

import { z } from 'zod';

import { DocumentType, formatUploadDate, type Document } from '../documents/index.js';
import {
  KnowledgeBaseError,
  KnowledgeBaseErrorCode,
  toKnowledgeBaseError,
} from '../errors/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import type { IngestResult, VectorStoreService } from '../qdrant/index.js';
import {
  type BatchIngestResult,
  type ScrapeClient,
  type UrlIngestResult,
  ScraperErrorCode,
  isScraperError,
  parseUrlList,
} from './types.js';

export type ScrapeTargetStore = Pick<VectorStoreService, 'ingest' | 'countBySource'>;

const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'Only http and https URLs can be scraped');

export class WebScraper {
  private readonly client: ScrapeClient;
  private readonly store: ScrapeTargetStore;
  private readonly logger: Logger;

  constructor(client: ScrapeClient, store: ScrapeTargetStore, logger?: Logger) {
    this.client = client;
    this.store = store;
    this.logger = logger ?? createLogger('scraper');
  }

  /**
   * Scrape a URL to markdown.
   *
   * @throws {KnowledgeBaseError} SCRAPE_FAILED, or UPSTREAM_TIMEOUT on timeout
   */
  async fetch(url: string): Promise<string> {
    try {
      return await this.client.scrape(url);
    } catch (error) {
      if (isScraperError(error) && error.code === ScraperErrorCode.TIMEOUT) {
        throw new KnowledgeBaseError(error.message, KnowledgeBaseErrorCode.UPSTREAM_TIMEOUT, {
          cause: error,
          metadata: { url },
        });
      }
      throw toKnowledgeBaseError(error, KnowledgeBaseErrorCode.SCRAPE_FAILED);
    }
  }

  /**
   * Number of stored chunks for a URL; 0 when the store cannot be reached
   */
  async exists(url: string): Promise<number> {
    try {
      return await this.store.countBySource(url);
    } catch (error) {
      this.logger.warn('Could not check for existing records', {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
      return 0;
    }
  }

  /**
   * Scrape a URL and store it.
   *
   * @throws {KnowledgeBaseError} INVALID_INPUT, ALREADY_INGESTED, SCRAPE_FAILED,
   *   STORAGE_FAILED or UPSTREAM_TIMEOUT
   */
  async ingest(url: string, force = false): Promise<UrlIngestResult> {
    const target = url.trim();
    if (!HttpUrlSchema.safeParse(target).success) {
      throw new KnowledgeBaseError(`Invalid URL: ${target || '(empty)'}`, KnowledgeBaseErrorCode.INVALID_INPUT);
    }

    if (!force) {
      const existing = await this.exists(target);
      if (existing > 0) {
        throw new KnowledgeBaseError(
          `${target} is already in the knowledge base (${existing} chunks); use force to scrape it again`,
          KnowledgeBaseErrorCode.ALREADY_INGESTED,
          { metadata: { url: target, existing } }
        );
      }
    }

    const markdown = await this.fetch(target);
    this.logger.info('Scraped page', { url: target, characters: markdown.length });

    const document: Document = {
      content: markdown,
      metadata: {
        source: target,
        type: DocumentType.WEBPAGE,
        upload_date: formatUploadDate(),
      },
    };

    let result: IngestResult;
    try {
      result = await this.store.ingest([document]);
    } catch (error) {
      throw toKnowledgeBaseError(error, KnowledgeBaseErrorCode.STORAGE_FAILED, `Failed to store ${target}`);
    }

    const firstFailure = result.failed[0];
    if (result.storedCount === 0 && firstFailure) {
      throw toKnowledgeBaseError(
        firstFailure.error,
        KnowledgeBaseErrorCode.STORAGE_FAILED,
        `Failed to store ${target}`
      );
    }

    return {
      url: target,
      chunkCount: result.chunkCount,
      storedCount: result.storedCount,
      failed: result.failed,
    };
  }

  /**
   * Ingest URLs one after another. Text input is split on newlines; blank
   * lines are skipped. One URL failing does not stop the rest.
   *
   * @throws {KnowledgeBaseError} INVALID_INPUT when no URL is given
   */
  async ingestMany(urls: string | readonly string[], force = false): Promise<BatchIngestResult> {
    const list =
      typeof urls === 'string'
        ? parseUrlList(urls)
        : urls.map((url) => url.trim()).filter((url) => url.length > 0);

    if (list.length === 0) {
      throw new KnowledgeBaseError('No URLs provided', KnowledgeBaseErrorCode.INVALID_INPUT);
    }

    const outcome: BatchIngestResult = { succeeded: [], failed: [] };

    for (const url of list) {
      try {
        outcome.succeeded.push(await this.ingest(url, force));
      } catch (error) {
        const wrapped = toKnowledgeBaseError(error, KnowledgeBaseErrorCode.SCRAPE_FAILED);
        this.logger.warn('URL ingestion failed', { url, code: wrapped.code, error: wrapped.message });
        outcome.failed.push({ url, code: wrapped.code, message: wrapped.message });
      }
    }

    this.logger.info('Batch scrape finished', {
      succeeded: outcome.succeeded.length,
      failed: outcome.failed.length,
    });

    return outcome;
  }
}
