/**
 * LLM Types
 *
 * Message, configuration and response types shared by the chat adapter and
 * the RAG chain.
 */

import { z } from 'zod';

// ============================================================================
// Provider
// ============================================================================

export const LLMProvider = {
  OPENAI: 'openai',
} as const;

export type LLMProvider = (typeof LLMProvider)[keyof typeof LLMProvider];

// ============================================================================
// Message Types
// ============================================================================

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

// ============================================================================
// Configuration
// ============================================================================

export const LLMConfigSchema = z.object({
  provider: z.literal('openai').default('openai'),
  /** Chat model identifier */
  model: z.string().min(1).default('gpt-4o-mini'),
  /** Maximum tokens in the response */
  maxTokens: z.number().int().positive().max(100000).default(1024),
  /** Sampling temperature (0-2) */
  temperature: z.number().min(0).max(2).default(0.3),
  /** Request timeout in milliseconds */
  timeoutMs: z.number().int().positive().default(60_000),
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;

export function createDefaultLLMConfig(overrides?: Partial<LLMConfig>): LLMConfig {
  return LLMConfigSchema.parse(overrides ?? {});
}

// ============================================================================
// Requests and Responses
// ============================================================================

export interface LLMCompletionOptions {
  temperature?: number;
  maxTokens?: number;
  stopSequences?: string[];
}

export interface LLMTokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface LLMResponse {
  /** Generated text; empty when the model produced none */
  content: string;
  usage: LLMTokenUsage;
  model: string;
  finishReason?: string | undefined;
}

// ============================================================================
// Error Types
// ============================================================================

export const LLMErrorCode = {
  RATE_LIMIT: 'rate_limit',
  AUTH_ERROR: 'auth_error',
  INVALID_REQUEST: 'invalid_request',
  MODEL_NOT_FOUND: 'model_not_found',
  TIMEOUT: 'timeout',
  SERVER_ERROR: 'server_error',
  NETWORK_ERROR: 'network_error',
  UNKNOWN: 'unknown',
} as const;

export type LLMErrorCode = (typeof LLMErrorCode)[keyof typeof LLMErrorCode];

export interface LLMErrorInfo {
  code: LLMErrorCode;
  message: string;
  provider: LLMProvider;
  originalError?: unknown;
}

// ============================================================================
// Utility Functions
// ============================================================================

export function createSystemMessage(content: string): LLMMessage {
  return { role: 'system', content };
}

export function createUserMessage(content: string): LLMMessage {
  return { role: 'user', content };
}

export function createAssistantMessage(content: string): LLMMessage {
  return { role: 'assistant', content };
}
