/**
 * Qdrant Configuration
 *
 * Connection and collection settings for the knowledge base collection.
 */

import { z } from 'zod';

import { loadAppConfig, type AppConfig } from '../config/index.js';

// =============================================================================
// Configuration Schema
// =============================================================================

export const QdrantConfigSchema = z.object({
  /** Cluster URL (e.g. http://localhost:6333 or a cloud endpoint) */
  url: z.string().url().min(1),

  /** API key; local instances usually run without one */
  apiKey: z.string().min(1).optional(),

  collectionName: z.string().min(1).default('hr_documents'),

  /** Vector dimensions (must match the embedding model) */
  vectorSize: z.number().int().positive().default(1536),

  distance: z.enum(['Cosine', 'Euclid', 'Dot']).default('Cosine'),

  /** Request timeout in milliseconds */
  timeout: z.number().int().positive().default(30000),
});

export type QdrantConfig = z.infer<typeof QdrantConfigSchema>;

/**
 * Payload field every listing and deletion filters on
 */
export const SOURCE_FIELD = 'metadata.source';

/**
 * Derive the Qdrant settings from the application configuration
 */
export function qdrantConfigFromApp(config: AppConfig): QdrantConfig {
  return QdrantConfigSchema.parse({
    url: config.qdrant.url,
    apiKey: config.qdrant.apiKey,
    collectionName: config.qdrant.collectionName,
    vectorSize: config.openai.embeddingDimensions,
    timeout: config.qdrant.timeoutMs,
  });
}

/**
 * Load Qdrant settings from environment variables.
 *
 * @throws {z.ZodError} If QDRANT_URL or another required variable is invalid
 */
export function loadQdrantConfig(env: NodeJS.ProcessEnv = process.env): QdrantConfig {
  return qdrantConfigFromApp(loadAppConfig(env));
}
