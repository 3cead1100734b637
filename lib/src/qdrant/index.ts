/**
 * Qdrant Vector Store Module
 */

export {
  QdrantConfigSchema,
  type QdrantConfig,
  SOURCE_FIELD,
  qdrantConfigFromApp,
  loadQdrantConfig,
} from './config.js';

export {
  createQdrantClient,
  getQdrantClient,
  resetQdrantClient,
  type ClusterHealthResult,
  checkClusterHealth,
  type EnsureCollectionResult,
  ensureCollection,
} from './client.js';

export {
  VectorStoreErrorCode,
  VectorStoreError,
  isVectorStoreError,
  ChunkPayloadSchema,
  type ChunkPayload,
  UNKNOWN_VALUE,
  formatPayloadForQdrant,
  parsePayloadFromQdrant,
  readListingFields,
  type FailedChunk,
  type StoreResult,
  type SourceStats,
  type RetrievedChunk,
  VectorStoreServiceConfigSchema,
  type VectorStoreServiceConfig,
  createDefaultVectorStoreConfig,
  generatePointId,
} from './types.js';

export {
  type VectorStoreDependencies,
  type IngestResult,
  VectorStoreService,
  createVectorStoreService,
} from './vector-store-service.js';
