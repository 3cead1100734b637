/**
 * Prompt Builder
 *
 * Renders the system prompt with retrieved context, then the session's
 * prior turns, then the new question.
 */

import { type LLMMessage, createAssistantMessage, createSystemMessage, createUserMessage } from '../llm/index.js';
import type { RetrievedChunk } from '../qdrant/index.js';
import type { ChatTurn } from '../sessions/index.js';
import { CONTEXT_PLACEHOLDER, CONTEXT_SEPARATOR, DEFAULT_SYSTEM_PROMPT } from './types.js';

export class PromptBuilder {
  private readonly systemPrompt: string;

  constructor(systemPrompt: string = DEFAULT_SYSTEM_PROMPT) {
    this.systemPrompt = systemPrompt;
  }

  /**
   * Context block: chunk contents separated by blank lines
   */
  formatContext(chunks: readonly RetrievedChunk[]): string {
    return chunks.map((chunk) => chunk.content).join(CONTEXT_SEPARATOR);
  }

  renderSystemPrompt(chunks: readonly RetrievedChunk[]): string {
    // split/join so `$` sequences in the context are not treated as replacement patterns
    return this.systemPrompt.split(CONTEXT_PLACEHOLDER).join(this.formatContext(chunks));
  }

  build(question: string, chunks: readonly RetrievedChunk[], history: readonly ChatTurn[] = []): LLMMessage[] {
    const messages: LLMMessage[] = [createSystemMessage(this.renderSystemPrompt(chunks))];

    for (const turn of history) {
      messages.push(
        turn.role === 'user' ? createUserMessage(turn.content) : createAssistantMessage(turn.content)
      );
    }

    messages.push(createUserMessage(question));
    return messages;
  }
}
