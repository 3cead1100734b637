/**
 * Qdrant Client
 *
 * Configured client construction plus the collection setup and health
 * checks used by the scripts.
 */

import { QdrantClient } from '@qdrant/js-client-rest';

import { loadQdrantConfig, SOURCE_FIELD, type QdrantConfig } from './config.js';

/** Singleton client instance */
let clientInstance: QdrantClient | null = null;

export function createQdrantClient(config: QdrantConfig): QdrantClient {
  return new QdrantClient({
    url: config.url,
    ...(config.apiKey !== undefined && { apiKey: config.apiKey }),
    timeout: config.timeout,
  });
}

/**
 * Get or create a client configured from the environment.
 *
 * @throws {z.ZodError} If the environment is not configured
 */
export function getQdrantClient(): QdrantClient {
  if (!clientInstance) {
    clientInstance = createQdrantClient(loadQdrantConfig());
  }
  return clientInstance;
}

export function resetQdrantClient(): void {
  clientInstance = null;
}

// =============================================================================
// Health
// =============================================================================

export interface ClusterHealthResult {
  healthy: boolean;
  collectionsCount?: number;
  latencyMs?: number;
  error?: string;
}

export async function checkClusterHealth(client: QdrantClient): Promise<ClusterHealthResult> {
  const startTime = performance.now();

  try {
    const { collections } = await client.getCollections();

    return {
      healthy: true,
      collectionsCount: collections.length,
      latencyMs: Math.round(performance.now() - startTime),
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    return {
      healthy: false,
      error: errorMessage,
    };
  }
}

// =============================================================================
// Collection Setup
// =============================================================================

export interface EnsureCollectionResult {
  /** Whether the collection was created by this call */
  created: boolean;
  /** Whether the source payload index was created by this call */
  indexCreated: boolean;
}

/**
 * Create the collection and its `metadata.source` keyword index, each only
 * when absent. Vector settings of an existing collection are not checked.
 */
export async function ensureCollection(
  client: QdrantClient,
  config: Pick<QdrantConfig, 'collectionName' | 'vectorSize' | 'distance'>
): Promise<EnsureCollectionResult> {
  const { exists } = await client.collectionExists(config.collectionName);

  if (!exists) {
    await client.createCollection(config.collectionName, {
      vectors: {
        size: config.vectorSize,
        distance: config.distance,
      },
    });
  } else {
    const info = await client.getCollection(config.collectionName);
    if (info.payload_schema[SOURCE_FIELD] !== undefined) {
      return { created: false, indexCreated: false };
    }
  }

  await client.createPayloadIndex(config.collectionName, {
    field_name: SOURCE_FIELD,
    field_schema: 'keyword',
    wait: true,
  });

  return { created: !exists, indexCreated: true };
}
