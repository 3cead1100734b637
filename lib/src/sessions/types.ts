/**
 * Session Store Types
 */

import { z } from 'zod';

export const ChatTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export type ChatTurn = z.infer<typeof ChatTurnSchema>;

export interface SessionHistory {
  id: string;
  /** Oldest first */
  messages: ChatTurn[];
  createdAt: Date;
  lastActiveAt: Date;
}

/**
 * Per-session chat history. Implementations must keep sessions
 * independent: writes to one id never change another's history.
 */
export interface SessionStore {
  /** Existing history, or a new empty one when the id is unknown (or expired) */
  getOrCreate(id: string): SessionHistory;
  /** History when present and not expired */
  get(id: string): SessionHistory | undefined;
  /** Append turns, creating the session when needed */
  append(id: string, ...messages: ChatTurn[]): void;
  delete(id: string): boolean;
  size(): number;
  /** Evict expired sessions; returns how many were removed */
  pruneExpired(now?: number): number;
}

export const SessionStoreConfigSchema = z.object({
  /** Idle time after which a session is evicted; 0 disables eviction */
  ttlMs: z.number().int().nonnegative().default(0),
  /** Most recent messages kept per session; 0 keeps everything */
  maxHistoryMessages: z.number().int().nonnegative().default(0),
});

export type SessionStoreConfig = z.infer<typeof SessionStoreConfigSchema>;
