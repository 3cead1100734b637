/**
 * Embeddings Module
 */

export {
  EmbeddingModel,
  DEFAULT_EMBEDDING_MODEL,
  EmbedderConfigSchema,
  type EmbedderConfig,
  createDefaultEmbedderConfig,
  type Embedder,
  EmbeddingErrorCode,
  EmbeddingError,
  isEmbeddingError,
  assertDimensions,
  toBatches,
} from './types.js';

export {
  type EmbeddingsClient,
  type OpenAIEmbedderOptions,
  OpenAIEmbedder,
  createOpenAIEmbedder,
} from './openai-embedder.js';
