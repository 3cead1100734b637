/**
 * Connectivity checks for the external services
 */

import type { QdrantClient } from '@qdrant/js-client-rest';

import type { Embedder } from '../embeddings/index.js';
import { checkClusterHealth } from '../qdrant/index.js';
import { type ConnectionCheck, ConnectionService } from './types.js';

export interface ConnectionTargets {
  embedder: Embedder;
  qdrant: QdrantClient;
  firecrawlApiKey: string | undefined;
}

export async function checkOpenAI(embedder: Embedder): Promise<ConnectionCheck> {
  const startTime = performance.now();
  try {
    const vector = await embedder.embedQuery('test');
    return {
      service: ConnectionService.OPENAI,
      ok: true,
      detail: `Embeddings working (dimension: ${vector.length})`,
      latencyMs: Math.round(performance.now() - startTime),
    };
  } catch (error) {
    return {
      service: ConnectionService.OPENAI,
      ok: false,
      detail: error instanceof Error ? error.message : String(error),
      latencyMs: Math.round(performance.now() - startTime),
    };
  }
}

export async function checkQdrant(client: QdrantClient): Promise<ConnectionCheck> {
  const startTime = performance.now();
  const health = await checkClusterHealth(client);
  return {
    service: ConnectionService.QDRANT,
    ok: health.healthy,
    detail: health.healthy
      ? `Connected (collections: ${health.collectionsCount ?? 0})`
      : (health.error ?? 'Unknown error'),
    latencyMs: Math.round(performance.now() - startTime),
  };
}

/**
 * Firecrawl has no free health endpoint; only the key's presence is checked
 */
export function checkFirecrawl(apiKey: string | undefined): ConnectionCheck {
  const configured = apiKey !== undefined && apiKey.trim().length > 0;
  return {
    service: ConnectionService.FIRECRAWL,
    ok: configured,
    detail: configured ? 'API key configured' : 'FIRECRAWL_API_KEY is not set',
    latencyMs: 0,
  };
}

export async function checkConnections(targets: ConnectionTargets): Promise<ConnectionCheck[]> {
  const [openai, qdrant] = await Promise.all([
    checkOpenAI(targets.embedder),
    checkQdrant(targets.qdrant),
  ]);
  return [openai, qdrant, checkFirecrawl(targets.firecrawlApiKey)];
}
