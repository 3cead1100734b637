/**
 * Web Scraper Module
 */

export {
  ScraperErrorCode,
  ScraperError,
  isScraperError,
  ScrapeResponseSchema,
  type ScrapeResponse,
  type NormalizedScrape,
  normalizeScrapeResponse,
  type ScrapeClient,
  type UrlIngestResult,
  type UrlIngestFailure,
  type BatchIngestResult,
  parseUrlList,
} from './types.js';

export { type FirecrawlClientConfig, FirecrawlClient } from './firecrawl-client.js';
export { type ScrapeTargetStore, WebScraper } from './web-scraper.js';
