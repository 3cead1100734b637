/**
 * Scrape API Endpoint (admin)
 *
 * POST /api/scrape
 * Request: { url, force? } or { urls: string | string[], force? }
 *
 * A single URL answers 201 or the error status of its failure. A batch
 * always answers 200 with per-URL outcomes.
 */

import { z } from 'zod';
import type { UrlIngestResult } from '@hr-assistant/lib';

import { createHandler } from './_shared/http.js';

const SingleScrapeSchema = z
  .object({
    url: z.string({ invalid_type_error: 'url must be a string' }).trim().min(1, 'url cannot be empty'),
    force: z.boolean().default(false),
  })
  .strict();

const BatchScrapeSchema = z
  .object({
    urls: z.union([z.string(), z.array(z.string())], {
      invalid_type_error: 'urls must be a string or an array of strings',
    }),
    force: z.boolean().default(false),
  })
  .strict();

const ScrapeRequestSchema = z.union([SingleScrapeSchema, BatchScrapeSchema]);

export interface ScrapeSummary {
  url: string;
  chunkCount: number;
  storedCount: number;
  failedCount: number;
}

export function summarizeScrape(result: UrlIngestResult): ScrapeSummary {
  return {
    url: result.url,
    chunkCount: result.chunkCount,
    storedCount: result.storedCount,
    failedCount: result.failed.length,
  };
}

export default createHandler(
  { name: 'scrape', methods: ['POST'], admin: true },
  async ({ req, res, services }) => {
    const body = ScrapeRequestSchema.parse(req.body);

    if ('url' in body) {
      const result = await services.admin.scrapeUrl(body.url, body.force);
      res.status(201).json(summarizeScrape(result));
      return;
    }

    const outcome = await services.admin.scrapeUrls(body.urls, body.force);
    res.status(200).json({
      succeeded: outcome.succeeded.map(summarizeScrape),
      failed: outcome.failed,
    });
  }
);
