#!/usr/bin/env tsx
/**
 * Create Collection Script
 *
 * Creates the knowledge base collection in Qdrant when it is missing:
 * - Vector size: EMBEDDING_DIMENSIONS (1536 for text-embedding-3-small)
 * - Distance metric: Cosine
 * - Keyword payload index on metadata.source (listing and deletion)
 *
 * Usage:
 *   npm run create-collection
 *
 * Required environment variables:
 *   - OPENAI_API_KEY
 *   - QDRANT_URL
 */

import {
  checkClusterHealth,
  createQdrantClient,
  ensureCollection,
  loadAppConfig,
  qdrantConfigFromApp,
} from '@hr-assistant/lib';

import { loadEnvironment, printBanner, requireValidEnv } from './shared.js';

async function main(): Promise<void> {
  loadEnvironment();
  printBanner('Create Knowledge Base Collection');

  console.log('Step 1: Validating environment variables...');
  requireValidEnv();
  const config = qdrantConfigFromApp(loadAppConfig());
  console.log(`  URL: ${config.url}`);
  console.log(`  Collection Name: ${config.collectionName}`);
  console.log(`  Vector Size: ${config.vectorSize}`);
  console.log(`  Distance Metric: ${config.distance}`);
  console.log('');

  console.log('Step 2: Checking cluster health...');
  const client = createQdrantClient(config);
  const health = await checkClusterHealth(client);

  if (!health.healthy) {
    console.error('');
    console.error('ERROR: Cluster health check failed.');
    console.error(`  Error: ${health.error ?? 'Unknown error'}`);
    process.exit(1);
  }
  console.log(`  Cluster is healthy (${health.collectionsCount ?? 0} collections).`);
  console.log('');

  console.log('Step 3: Ensuring collection and payload index...');
  const result = await ensureCollection(client, config);

  console.log(
    result.created
      ? `  Collection '${config.collectionName}' created.`
      : `  Collection '${config.collectionName}' already exists.`
  );
  console.log(
    result.indexCreated ? '  Index on metadata.source created.' : '  Index on metadata.source already exists.'
  );
  console.log('');
  console.log('Collection is ready.');
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
