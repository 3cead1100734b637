/**
 * Firecrawl Client
 *
 * Scrapes a URL to markdown through the Firecrawl REST API.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import {
  type ScrapeClient,
  ScraperError,
  ScraperErrorCode,
  normalizeScrapeResponse,
} from './types.js';

export interface FirecrawlClientConfig {
  apiKey: string | undefined;
  baseUrl: string;
  timeoutMs: number;
}

const DEFAULT_BASE_URL = 'https://api.firecrawl.dev';

export class FirecrawlClient implements ScrapeClient {
  private readonly config: FirecrawlClientConfig;
  private readonly http: AxiosInstance;

  constructor(config: Partial<FirecrawlClientConfig> = {}, http?: AxiosInstance) {
    this.config = {
      apiKey: config.apiKey ?? process.env['FIRECRAWL_API_KEY'],
      baseUrl: (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
      timeoutMs: config.timeoutMs ?? 60_000,
    };
    this.http = http ?? axios.create();
  }

  /**
   * @throws {ScraperError} On a missing key, non-2xx status, timeout or empty content
   */
  async scrape(url: string): Promise<string> {
    if (!this.config.apiKey) {
      throw new ScraperError('FIRECRAWL_API_KEY is not configured', ScraperErrorCode.NOT_CONFIGURED);
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(
        `${this.config.baseUrl}/v1/scrape`,
        { url, formats: ['markdown'] },
        {
          headers: {
            Authorization: `Bearer ${this.config.apiKey}`,
            'Content-Type': 'application/json',
          },
          timeout: this.config.timeoutMs,
          validateStatus: () => true,
        }
      );
    } catch (error) {
      throw this.handleError(error);
    }

    const { markdown, error } = normalizeScrapeResponse(response.data);

    if (response.status < 200 || response.status >= 300) {
      throw new ScraperError(
        `Scrape request failed with status ${response.status}${error ? `: ${error}` : ''}`,
        ScraperErrorCode.HTTP_ERROR,
        { status: response.status }
      );
    }

    if (!markdown) {
      throw new ScraperError(
        error ? `Failed to scrape - ${error}` : 'Failed to scrape - no content retrieved',
        error ? ScraperErrorCode.HTTP_ERROR : ScraperErrorCode.NO_CONTENT,
        { status: response.status }
      );
    }

    return markdown;
  }

  private handleError(error: unknown): ScraperError {
    if (axios.isAxiosError(error)) {
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new ScraperError(
          `Scrape request timed out after ${this.config.timeoutMs}ms`,
          ScraperErrorCode.TIMEOUT,
          { cause: error }
        );
      }
      return new ScraperError(`Scrape request failed: ${error.message}`, ScraperErrorCode.NETWORK_ERROR, {
        cause: error,
      });
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ScraperError(`Scrape request failed: ${message}`, ScraperErrorCode.NETWORK_ERROR, {
      cause: error instanceof Error ? error : undefined,
    });
  }
}
