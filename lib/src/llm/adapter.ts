/**
 * LLM Adapter Base Class
 *
 * Chat providers implement `complete`; the base class holds the
 * configuration and the checks every provider shares.
 */

import {
  type LLMConfig,
  type LLMMessage,
  type LLMResponse,
  type LLMCompletionOptions,
  type LLMProvider,
  createDefaultLLMConfig,
} from './types.js';
import { InvalidRequestError } from './errors.js';

export abstract class LLMAdapter {
  protected readonly config: LLMConfig;

  constructor(config?: Partial<LLMConfig>) {
    this.config = createDefaultLLMConfig(config);
  }

  /**
   * Generate a completion for the conversation.
   *
   * @throws {LLMError} If the provider call fails
   */
  abstract complete(messages: LLMMessage[], options?: LLMCompletionOptions): Promise<LLMResponse>;

  get provider(): LLMProvider {
    return this.config.provider;
  }

  get model(): string {
    return this.config.model;
  }

  getConfig(): Readonly<LLMConfig> {
    return { ...this.config };
  }

  // ===========================================================================
  // Protected Helper Methods
  // ===========================================================================

  protected mergeOptions(
    options?: LLMCompletionOptions
  ): Required<Pick<LLMCompletionOptions, 'temperature' | 'maxTokens'>> &
    Pick<LLMCompletionOptions, 'stopSequences'> {
    return {
      temperature: options?.temperature ?? this.config.temperature,
      maxTokens: options?.maxTokens ?? this.config.maxTokens,
      stopSequences: options?.stopSequences,
    };
  }

  /**
   * @throws {InvalidRequestError} If there is no user or assistant message
   */
  protected validateMessages(messages: LLMMessage[]): void {
    if (messages.length === 0) {
      throw new InvalidRequestError('Messages array must not be empty', this.config.provider);
    }

    if (!messages.some((m) => m.role !== 'system')) {
      throw new InvalidRequestError(
        'Messages must contain at least one user or assistant message',
        this.config.provider
      );
    }
  }
}
