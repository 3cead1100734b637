/**
 * HR Policy Assistant - Shared Library
 *
 * Ingestion, retrieval and chat logic shared by the HTTP handlers and scripts.
 */

// Configuration
export * from './config/index.js';

// Logging
export * from './logging/index.js';

// Error Taxonomy
export * from './errors/index.js';

// Documents and Chunking
export * from './documents/index.js';
export * from './chunking/index.js';

// Embeddings and LLM
export * from './embeddings/index.js';
export * from './llm/index.js';

// Qdrant (Vector Database)
export * from './qdrant/index.js';

// Loaders and Scraper
export * from './loaders/index.js';
export * from './scraper/index.js';

// Sessions and RAG
export * from './sessions/index.js';
export * from './rag/index.js';

// Admin Operations
export * from './admin/index.js';

// Service Graph
export * from './services/index.js';
