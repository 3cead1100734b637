/**
 * OpenAI Adapter
 *
 * Chat completions through the OpenAI API. The SDK's own retries are
 * disabled; a failed or timed-out call surfaces immediately as a typed
 * LLMError.
 *
 * @module lib/src/llm/adapters/openai
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import { LLMAdapter } from '../adapter.js';
import {
  type LLMConfig,
  type LLMMessage,
  type LLMResponse,
  type LLMCompletionOptions,
  LLMProvider,
} from '../types.js';
import {
  LLMError,
  RateLimitError,
  AuthenticationError,
  InvalidRequestError,
  ModelNotFoundError,
  TimeoutError,
  ServerError,
  NetworkError,
} from '../errors.js';

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * The part of the OpenAI client the adapter calls
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { timeout?: number }
      ): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIAdapterConfig extends Partial<LLMConfig> {
  apiKey?: string | undefined;
  /** Base URL for API requests (proxies, compatible gateways) */
  baseUrl?: string | undefined;
  /** Pre-built client; takes precedence over apiKey/baseUrl */
  client?: ChatCompletionsClient | undefined;
}

// =============================================================================
// OpenAI Adapter Class
// =============================================================================

/**
 * @example
 * ```typescript
 * const adapter = new OpenAIAdapter({ model: 'gpt-4o-mini', temperature: 0.3 });
 * const response = await adapter.complete([
 *   { role: 'system', content: 'You are a helpful HR assistant.' },
 *   { role: 'user', content: 'How many vacation days do I get?' },
 * ]);
 * ```
 */
export class OpenAIAdapter extends LLMAdapter {
  private readonly client: ChatCompletionsClient;

  constructor(config: OpenAIAdapterConfig = {}) {
    const { apiKey, baseUrl, client, ...llmConfig } = config;
    super({ ...llmConfig, provider: LLMProvider.OPENAI });

    this.client =
      client ??
      new OpenAI({
        apiKey: apiKey ?? process.env['OPENAI_API_KEY'],
        baseURL: baseUrl,
        timeout: this.config.timeoutMs,
        maxRetries: 0,
      });
  }

  /**
   * @throws {LLMError} If the completion fails
   */
  async complete(messages: LLMMessage[], options?: LLMCompletionOptions): Promise<LLMResponse> {
    this.validateMessages(messages);

    const mergedOptions = this.mergeOptions(options);

    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.config.model,
      messages: this.convertMessages(messages),
      temperature: mergedOptions.temperature,
      max_tokens: mergedOptions.maxTokens,
    };

    if (mergedOptions.stopSequences !== undefined) {
      params.stop = mergedOptions.stopSequences;
    }

    let response: ChatCompletion;
    try {
      response = await this.client.chat.completions.create(params, {
        timeout: this.config.timeoutMs,
      });
    } catch (error) {
      throw this.handleError(error);
    }

    const choice = response.choices[0];

    return {
      content: choice?.message.content ?? '',
      model: response.model,
      usage: {
        inputTokens: response.usage?.prompt_tokens ?? 0,
        outputTokens: response.usage?.completion_tokens ?? 0,
      },
      finishReason: choice?.finish_reason,
    };
  }

  // ===========================================================================
  // Private Helper Methods
  // ===========================================================================

  private convertMessages(messages: LLMMessage[]): ChatCompletionMessageParam[] {
    return messages.map((msg): ChatCompletionMessageParam => {
      switch (msg.role) {
        case 'system':
          return { role: 'system', content: msg.content };
        case 'assistant':
          return { role: 'assistant', content: msg.content };
        case 'user':
          return { role: 'user', content: msg.content };
      }
    });
  }

  /**
   * Maps OpenAI SDK errors to LLMError subclasses. The timeout check comes
   * first because the SDK's timeout error is also a connection error.
   */
  private handleError(error: unknown): LLMError {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new TimeoutError(
        `Request timeout after ${this.config.timeoutMs}ms`,
        LLMProvider.OPENAI,
        error
      );
    }

    if (error instanceof OpenAI.APIConnectionError) {
      return new NetworkError(`Connection error: ${error.message}`, LLMProvider.OPENAI, error);
    }

    if (error instanceof OpenAI.APIError) {
      const status = error.status;
      const message = error.message;

      if (status === 401) {
        return new AuthenticationError(
          `Authentication failed: ${message}`,
          LLMProvider.OPENAI,
          error
        );
      }
      if (status === 429) {
        return new RateLimitError(`Rate limit exceeded: ${message}`, LLMProvider.OPENAI, error);
      }
      if (status === 400) {
        return new InvalidRequestError(`Invalid request: ${message}`, LLMProvider.OPENAI, error);
      }
      if (status === 404) {
        return new ModelNotFoundError(`Model not found: ${message}`, LLMProvider.OPENAI, error);
      }
      if (status !== undefined && status >= 500) {
        return new ServerError(`Server error: ${message}`, LLMProvider.OPENAI, error);
      }
    }

    return LLMError.fromError(error, LLMProvider.OPENAI);
  }
}

export function createOpenAIAdapter(config?: OpenAIAdapterConfig): OpenAIAdapter {
  return new OpenAIAdapter(config);
}
