/**
 * RAG Module
 *
 * Retrieval, prompt rendering and session-aware answering.
 */

export {
  CONTEXT_PLACEHOLDER,
  CONTEXT_SEPARATOR,
  DEFAULT_SYSTEM_PROMPT,
  NO_ANSWER,
  RAGChainConfigSchema,
  type RAGChainConfig,
  createDefaultRAGChainConfig,
  type Retriever,
  type RAGChainDependencies,
  type AskResult,
} from './types.js';

export { PromptBuilder } from './prompt-builder.js';
export { RAGChain, createRAGChain } from './rag-chain.js';
export { PERSONAL_INFO_WARNING, detectPersonalNames, containsPersonalNames } from './privacy.js';
