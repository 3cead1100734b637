/**
 * Chat API Endpoint
 *
 * POST /api/chat
 * Request: { message: string, sessionId?: string }
 * Response: { answer: string, sources: Source[], sessionId: string, warning?: string }
 *
 * A request without a sessionId starts a new session; the generated id is
 * returned so the caller can continue the conversation.
 */

import { randomUUID } from 'node:crypto';

import { z } from 'zod';
import { PERSONAL_INFO_WARNING, type RetrievedChunk, detectPersonalNames } from '@hr-assistant/lib';

import { createHandler } from './_shared/http.js';

/** Maximum message length in characters */
const MAX_MESSAGE_LENGTH = 2000;

const ChatRequestSchema = z
  .object({
    message: z
      .string({
        required_error: 'Message is required',
        invalid_type_error: 'Message must be a string',
      })
      .max(MAX_MESSAGE_LENGTH, `Message cannot exceed ${MAX_MESSAGE_LENGTH} characters`)
      .transform((value) => value.trim())
      .refine((value) => value.length > 0, { message: 'Message cannot be empty' }),
    sessionId: z
      .string({ invalid_type_error: 'sessionId must be a string' })
      .trim()
      .min(1, 'sessionId cannot be empty')
      .max(128, 'sessionId cannot exceed 128 characters')
      .optional(),
  })
  .strict();

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

export interface Source {
  source: string;
  type: string;
  uploadDate: string;
  page?: number;
  excerpt: string;
  score: number;
}

export interface ChatResponse {
  answer: string;
  sources: Source[];
  sessionId: string;
  warning?: string;
}

export function toSource(chunk: RetrievedChunk): Source {
  return {
    source: chunk.metadata.source,
    type: chunk.metadata.type,
    uploadDate: chunk.metadata.upload_date,
    ...(chunk.metadata.page !== undefined && { page: chunk.metadata.page }),
    excerpt: chunk.content,
    score: chunk.score,
  };
}

export default createHandler({ name: 'chat', methods: ['POST'] }, async ({ req, res, services, logger }) => {
  const { message, sessionId } = ChatRequestSchema.parse(req.body);
  const session = sessionId ?? randomUUID();

  const names = detectPersonalNames(message);
  if (names.length > 0) {
    logger.warn('Question may contain personal names', { sessionId: session, matches: names.length });
  }

  const result = await services.chain.ask(message, session);

  const response: ChatResponse = {
    answer: names.length > 0 ? `${PERSONAL_INFO_WARNING}${result.answer}` : result.answer,
    sources: result.sources.slice(0, services.config.retrieval.maxSources).map(toSource),
    sessionId: result.sessionId,
    ...(names.length > 0 && { warning: PERSONAL_INFO_WARNING.trim() }),
  };

  res.status(200).json(response);
});
