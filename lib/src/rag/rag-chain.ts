/**
 * RAG Chain
 *
 * Conversational retrieval: retrieve the top-k chunks for a question,
 * answer from them with the session's history, then record the turn.
 */

import { KnowledgeBaseError, KnowledgeBaseErrorCode, toKnowledgeBaseError } from '../errors/index.js';
import type { LLMAdapter } from '../llm/index.js';
import { createLogger, type Logger } from '../logging/index.js';
import type { RetrievedChunk } from '../qdrant/index.js';
import type { SessionStore } from '../sessions/index.js';
import { PromptBuilder } from './prompt-builder.js';
import {
  type AskResult,
  type RAGChainConfig,
  type RAGChainDependencies,
  type Retriever,
  NO_ANSWER,
  createDefaultRAGChainConfig,
} from './types.js';

// =============================================================================
// RAGChain Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const chain = new RAGChain({
 *   retriever: vectorStore,
 *   llm: createOpenAIAdapter({ apiKey }),
 *   sessions: new InMemorySessionStore(),
 * });
 *
 * const { answer, sources } = await chain.ask('How many sick days do staff get?', 'session-1');
 * ```
 */
export class RAGChain {
  private readonly retriever: Retriever;
  private readonly llm: LLMAdapter;
  private readonly sessions: SessionStore;
  private readonly logger: Logger;
  private readonly config: RAGChainConfig;
  private readonly promptBuilder: PromptBuilder;

  constructor(deps: RAGChainDependencies, config?: Partial<RAGChainConfig>) {
    this.retriever = deps.retriever;
    this.llm = deps.llm;
    this.sessions = deps.sessions;
    this.logger = deps.logger ?? createLogger('rag');
    this.config = createDefaultRAGChainConfig(config);
    this.promptBuilder = new PromptBuilder(this.config.systemPrompt);
  }

  /**
   * Answer a question within a session.
   *
   * The session's history is extended only when an answer was produced.
   *
   * @throws {KnowledgeBaseError} INVALID_INPUT for a blank question or session id,
   *   GENERATION_FAILED, or UPSTREAM_TIMEOUT on timeout
   */
  async ask(question: string, sessionId: string): Promise<AskResult> {
    const query = question.trim();
    if (query.length === 0) {
      throw new KnowledgeBaseError('Question must not be empty', KnowledgeBaseErrorCode.INVALID_INPUT);
    }
    if (sessionId.trim().length === 0) {
      throw new KnowledgeBaseError('Session id must not be empty', KnowledgeBaseErrorCode.INVALID_INPUT);
    }

    const startTime = performance.now();
    const history = this.sessions.getOrCreate(sessionId).messages;

    let sources: RetrievedChunk[];
    try {
      sources = await this.retriever.search(query, this.config.topK);
    } catch (error) {
      throw this.wrapError(error, sessionId, 'Retrieval failed');
    }

    const messages = this.promptBuilder.build(query, sources, history);

    let answer: string;
    try {
      const response = await this.llm.complete(messages, { temperature: this.config.temperature });
      answer = response.content.trim().length > 0 ? response.content : NO_ANSWER;
    } catch (error) {
      throw this.wrapError(error, sessionId, 'Answer generation failed');
    }

    this.sessions.append(
      sessionId,
      { role: 'user', content: query },
      { role: 'assistant', content: answer }
    );

    this.logger.info('Answered question', {
      sessionId,
      sources: sources.length,
      historyMessages: history.length,
      durationMs: Math.round(performance.now() - startTime),
    });

    return { answer, sources, sessionId };
  }

  getConfig(): Readonly<RAGChainConfig> {
    return { ...this.config };
  }

  private wrapError(error: unknown, sessionId: string, context: string): KnowledgeBaseError {
    const wrapped = toKnowledgeBaseError(error, KnowledgeBaseErrorCode.GENERATION_FAILED, context);
    this.logger.error(context, error, { sessionId, code: wrapped.code });
    return wrapped;
  }
}

export function createRAGChain(deps: RAGChainDependencies, config?: Partial<RAGChainConfig>): RAGChain {
  return new RAGChain(deps, config);
}
