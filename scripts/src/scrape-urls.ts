#!/usr/bin/env tsx
/**
 * Batch Scrape Script
 *
 * Scrapes every URL in a newline-separated file into the knowledge base.
 * URLs that are already ingested fail with ALREADY_INGESTED unless --force
 * is given.
 *
 * Usage:
 *   npm run scrape-urls -- <file> [--force]
 */

import { readFile } from 'node:fs/promises';

import { createServices, loadAppConfig } from '@hr-assistant/lib';

import { loadEnvironment, parseFlags, printBanner, requireValidEnv } from './shared.js';

async function main(): Promise<void> {
  loadEnvironment();
  const { positional, flags } = parseFlags(process.argv.slice(2));
  const file = positional[0];

  if (!file) {
    console.log('Usage: npm run scrape-urls -- <file> [--force]');
    process.exit(1);
  }
  const force = flags.get('force') === true;

  printBanner('Scrape URLs');
  requireValidEnv({ requireScraper: true });

  const text = await readFile(file, 'utf8');
  const services = createServices(loadAppConfig());
  const outcome = await services.admin.scrapeUrls(text, force);

  for (const result of outcome.succeeded) {
    console.log(`  ✓ ${result.url}: ${result.storedCount}/${result.chunkCount} chunks stored`);
  }
  for (const failure of outcome.failed) {
    console.error(`  ✗ ${failure.url}: [${failure.code}] ${failure.message}`);
  }

  console.log('');
  console.log(`Done: ${outcome.succeeded.length} succeeded, ${outcome.failed.length} failed`);
  process.exit(outcome.failed.length > 0 ? 1 : 0);
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
