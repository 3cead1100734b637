/**
 * Service Graph
 *
 * Wires every component from one AppConfig. HTTP handlers build the graph
 * once per process; scripts build it once per run. Tests pass in-process
 * clients through `ServiceClients`.
 */

import type { QdrantClient } from '@qdrant/js-client-rest';
import type { AxiosInstance } from 'axios';

import { AdminService } from '../admin/index.js';
import type { AppConfig } from '../config/index.js';
import { type EmbeddingsClient, OpenAIEmbedder } from '../embeddings/index.js';
import { type ChatCompletionsClient, OpenAIAdapter } from '../llm/index.js';
import { DocumentLoader, type TextExtractors } from '../loaders/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import { VectorStoreService, createQdrantClient, qdrantConfigFromApp } from '../qdrant/index.js';
import { RAGChain } from '../rag/index.js';
import { FirecrawlClient, WebScraper } from '../scraper/index.js';
import { InMemorySessionStore, type SessionStore } from '../sessions/index.js';

export interface ServiceClients {
  qdrant?: QdrantClient | undefined;
  embeddings?: EmbeddingsClient | undefined;
  chat?: ChatCompletionsClient | undefined;
  /** axios instance used for Firecrawl requests */
  http?: AxiosInstance | undefined;
  extractors?: Partial<TextExtractors> | undefined;
  sessions?: SessionStore | undefined;
  logger?: Logger | undefined;
}

export interface Services {
  config: AppConfig;
  logger: Logger;
  qdrant: QdrantClient;
  embedder: OpenAIEmbedder;
  vectorStore: VectorStoreService;
  llm: OpenAIAdapter;
  sessions: SessionStore;
  chain: RAGChain;
  scraper: WebScraper;
  admin: AdminService;
}

export function createServices(config: AppConfig, clients: ServiceClients = {}): Services {
  const logger = clients.logger ?? createLogger('hr-assistant');
  const qdrantConfig = qdrantConfigFromApp(config);
  const qdrant = clients.qdrant ?? createQdrantClient(qdrantConfig);

  const embedder = new OpenAIEmbedder({
    apiKey: config.openai.apiKey,
    client: clients.embeddings,
    model: config.openai.embeddingModel,
    dimensions: config.openai.embeddingDimensions,
    timeoutMs: config.openai.timeoutMs,
  });

  const vectorStore = new VectorStoreService(
    {
      collectionName: qdrantConfig.collectionName,
      vectorDimensions: config.openai.embeddingDimensions,
      chunkSize: config.chunking.chunkSize,
      chunkOverlap: config.chunking.chunkOverlap,
      defaultSearchLimit: config.retrieval.topK,
    },
    { client: qdrant, embedder, logger: logger.child('vector-store') }
  );

  const llm = new OpenAIAdapter({
    apiKey: config.openai.apiKey,
    client: clients.chat,
    model: config.openai.chatModel,
    temperature: config.openai.temperature,
    timeoutMs: config.openai.timeoutMs,
  });

  const sessions = clients.sessions ?? new InMemorySessionStore({ ttlMs: config.sessions.ttlMs });

  const chain = new RAGChain(
    { retriever: vectorStore, llm, sessions, logger: logger.child('rag') },
    { topK: config.retrieval.topK, temperature: config.openai.temperature }
  );

  const scraper = new WebScraper(
    new FirecrawlClient(
      {
        apiKey: config.firecrawl.apiKey,
        baseUrl: config.firecrawl.baseUrl,
        timeoutMs: config.firecrawl.timeoutMs,
      },
      clients.http
    ),
    vectorStore,
    logger.child('scraper')
  );

  const admin = new AdminService({
    store: vectorStore,
    scraper,
    loader: new DocumentLoader(clients.extractors, logger.child('loader')),
    logger: logger.child('admin'),
  });

  return { config, logger, qdrant, embedder, vectorStore, llm, sessions, chain, scraper, admin };
}
