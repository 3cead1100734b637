/**
 * RAG Chain Types
 *
 * Configuration, prompt template and result shapes for answering HR
 * questions from retrieved knowledge base chunks.
 */

import { z } from 'zod';

import type { LLMAdapter } from '../llm/index.js';
import type { Logger } from '../logging/index.js';
import type { RetrievedChunk, VectorStoreService } from '../qdrant/index.js';
import type { SessionStore } from '../sessions/index.js';

// =============================================================================
// Prompt
// =============================================================================

/** Placeholder replaced with the retrieved context */
export const CONTEXT_PLACEHOLDER = '{context}';

export const DEFAULT_SYSTEM_PROMPT = `You are an HR assistant for nonprofit organizations in Canada.
Use the following context to answer questions accurately and helpfully.

IMPORTANT DISCLAIMERS:
- This tool provides general HR information only
- Not a substitute for professional legal or HR advice
- Consult qualified professionals before implementing policies
- Do NOT share personal information about specific individuals

Context:
${CONTEXT_PLACEHOLDER}

Provide a clear, helpful answer. If you're not certain, say so. Always remind users to consult HR/legal professionals for important decisions.`;

/** Answer returned when the model produces no text */
export const NO_ANSWER = 'No answer generated';

/** Separator between retrieved chunks in the context block */
export const CONTEXT_SEPARATOR = '\n\n';

// =============================================================================
// Configuration
// =============================================================================

export const RAGChainConfigSchema = z.object({
  /** Chunks retrieved per question */
  topK: z.number().int().positive().default(5),
  temperature: z.number().min(0).max(2).default(0.3),
  systemPrompt: z
    .string()
    .includes(CONTEXT_PLACEHOLDER, { message: 'systemPrompt must contain {context}' })
    .default(DEFAULT_SYSTEM_PROMPT),
});

export type RAGChainConfig = z.infer<typeof RAGChainConfigSchema>;

export function createDefaultRAGChainConfig(overrides?: Partial<RAGChainConfig>): RAGChainConfig {
  return RAGChainConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Dependencies & Results
// =============================================================================

export type Retriever = Pick<VectorStoreService, 'search'>;

export interface RAGChainDependencies {
  retriever: Retriever;
  llm: LLMAdapter;
  sessions: SessionStore;
  logger?: Logger | undefined;
}

export interface AskResult {
  answer: string;
  /** Every retrieved chunk, in retrieval order */
  sources: RetrievedChunk[];
  sessionId: string;
}
