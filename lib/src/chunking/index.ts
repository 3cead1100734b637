/**
 * Chunking Module
 */

export {
  DEFAULT_SEPARATORS,
  ChunkingConfigSchema,
  type ChunkingConfig,
  createDefaultChunkingConfig,
  type TextSpan,
  reassembleChunks,
} from './types.js';

export { RecursiveTextSplitter, chunkDocuments } from './splitter.js';
