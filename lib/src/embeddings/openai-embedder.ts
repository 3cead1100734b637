/**
 * OpenAI Embedder
 *
 * Embeds text through the OpenAI embeddings endpoint. Inputs are sent in
 * batches of `batchSize`; vectors come back in input order regardless of
 * the order the provider lists them in.
 */

import OpenAI from 'openai';
import type {
  CreateEmbeddingResponse,
  EmbeddingCreateParams,
} from 'openai/resources/embeddings';

import { createLogger } from '../logging/index.js';
import {
  type Embedder,
  type EmbedderConfig,
  EmbeddingError,
  EmbeddingErrorCode,
  assertDimensions,
  createDefaultEmbedderConfig,
  toBatches,
} from './types.js';

const logger = createLogger('embeddings');

// =============================================================================
// Client Interface
// =============================================================================

/**
 * The part of the OpenAI client the embedder calls. Tests pass a stub.
 */
export interface EmbeddingsClient {
  embeddings: {
    create(
      body: EmbeddingCreateParams,
      options?: { timeout?: number }
    ): Promise<CreateEmbeddingResponse>;
  };
}

export interface OpenAIEmbedderOptions extends Partial<EmbedderConfig> {
  apiKey?: string | undefined;
  client?: EmbeddingsClient | undefined;
}

// =============================================================================
// OpenAIEmbedder Class
// =============================================================================

export class OpenAIEmbedder implements Embedder {
  private readonly config: EmbedderConfig;
  private readonly client: EmbeddingsClient;

  constructor(options: OpenAIEmbedderOptions = {}) {
    const { apiKey, client, ...config } = options;
    this.config = createDefaultEmbedderConfig(config);
    this.client =
      client ??
      new OpenAI({
        apiKey: apiKey ?? process.env['OPENAI_API_KEY'],
        timeout: this.config.timeoutMs,
        maxRetries: 0,
      });
  }

  get dimensions(): number {
    return this.config.dimensions;
  }

  get batchSize(): number {
    return this.config.batchSize;
  }

  getConfig(): Readonly<EmbedderConfig> {
    return { ...this.config };
  }

  async embedQuery(text: string): Promise<number[]> {
    if (text.trim().length === 0) {
      throw new EmbeddingError('Cannot embed empty text', EmbeddingErrorCode.EMPTY_INPUT);
    }

    const [vector] = await this.request([text]);
    if (!vector) {
      throw new EmbeddingError(
        'Provider returned no embedding for query',
        EmbeddingErrorCode.INCOMPLETE_RESPONSE
      );
    }
    return vector;
  }

  async embedDocuments(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const vectors: number[][] = [];
    const startTime = performance.now();

    for (const batch of toBatches(texts, this.config.batchSize)) {
      vectors.push(...(await this.request(batch)));
    }

    logger.debug('Embedded texts', {
      count: texts.length,
      durationMs: Math.round(performance.now() - startTime),
    });

    return vectors;
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async request(inputs: string[]): Promise<number[][]> {
    let response: CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create(
        {
          model: this.config.model,
          input: inputs,
          dimensions: this.config.dimensions,
          encoding_format: 'float',
        },
        { timeout: this.config.timeoutMs }
      );
    } catch (error) {
      throw this.handleError(error);
    }

    if (response.data.length !== inputs.length) {
      throw new EmbeddingError(
        `Expected ${inputs.length} embeddings, received ${response.data.length}`,
        EmbeddingErrorCode.INCOMPLETE_RESPONSE
      );
    }

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    return ordered.map((item) => {
      assertDimensions(item.embedding, this.config.dimensions);
      return item.embedding;
    });
  }

  private handleError(error: unknown): EmbeddingError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new EmbeddingError(
        `Embedding request timed out after ${this.config.timeoutMs}ms`,
        EmbeddingErrorCode.TIMEOUT,
        { cause: error }
      );
    }
    if (error instanceof OpenAI.APIError) {
      return new EmbeddingError(
        `Embedding request failed: ${error.message}`,
        EmbeddingErrorCode.PROVIDER_ERROR,
        { cause: error }
      );
    }
    return EmbeddingError.fromError(error);
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createOpenAIEmbedder(options?: OpenAIEmbedderOptions): OpenAIEmbedder {
  return new OpenAIEmbedder(options);
}
