#!/usr/bin/env tsx
/**
 * Connection Check Script
 *
 * Verifies that OpenAI embeddings and Qdrant respond and that a Firecrawl
 * key is configured. Exits non-zero when any check fails.
 *
 * Usage:
 *   npm run check-connections
 */

import { checkConnections, createServices, loadAppConfig } from '@hr-assistant/lib';

import { loadEnvironment, printBanner, requireValidEnv } from './shared.js';

async function main(): Promise<void> {
  loadEnvironment();
  printBanner('Check Connections');
  requireValidEnv();

  const config = loadAppConfig();
  const services = createServices(config);
  const checks = await checkConnections({
    embedder: services.embedder,
    qdrant: services.qdrant,
    firecrawlApiKey: config.firecrawl.apiKey,
  });

  for (const check of checks) {
    const mark = check.ok ? '✓' : '✗';
    console.log(`  ${mark} ${check.service.padEnd(10)} ${check.detail} (${check.latencyMs}ms)`);
  }

  const failed = checks.filter((check) => !check.ok);
  console.log('');
  console.log(failed.length === 0 ? 'All connections OK.' : `${failed.length} check(s) failed.`);
  process.exit(failed.length === 0 ? 0 : 1);
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
