/**
 * In-Memory Session Store
 *
 * Map-backed history for a single process. Each call runs to completion
 * on the event loop, so concurrent first access to an id creates exactly
 * one session.
 */

import {
  type ChatTurn,
  type SessionHistory,
  type SessionStore,
  type SessionStoreConfig,
  SessionStoreConfigSchema,
} from './types.js';

interface StoredSession {
  id: string;
  messages: ChatTurn[];
  createdAt: number;
  lastActiveAt: number;
}

export interface InMemorySessionStoreOptions extends Partial<SessionStoreConfig> {
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, StoredSession>();
  private readonly config: SessionStoreConfig;
  private readonly now: () => number;

  constructor(options: InMemorySessionStoreOptions = {}) {
    const { now, ...config } = options;
    this.config = SessionStoreConfigSchema.parse(config);
    this.now = now ?? Date.now;
  }

  getOrCreate(id: string): SessionHistory {
    const time = this.now();
    let session = this.live(id, time);

    if (!session) {
      session = { id, messages: [], createdAt: time, lastActiveAt: time };
      this.sessions.set(id, session);
    } else {
      session.lastActiveAt = time;
    }

    return snapshot(session);
  }

  get(id: string): SessionHistory | undefined {
    const session = this.live(id, this.now());
    return session ? snapshot(session) : undefined;
  }

  append(id: string, ...messages: ChatTurn[]): void {
    const time = this.now();
    let session = this.live(id, time);

    if (!session) {
      session = { id, messages: [], createdAt: time, lastActiveAt: time };
      this.sessions.set(id, session);
    }

    session.messages.push(...messages.map((message) => ({ ...message })));
    session.lastActiveAt = time;

    const max = this.config.maxHistoryMessages;
    if (max > 0 && session.messages.length > max) {
      session.messages.splice(0, session.messages.length - max);
    }
  }

  delete(id: string): boolean {
    return this.sessions.delete(id);
  }

  size(): number {
    return this.sessions.size;
  }

  pruneExpired(now: number = this.now()): number {
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.sessions.clear();
  }

  /**
   * The stored session, evicting it first when it has expired
   */
  private live(id: string, now: number): StoredSession | undefined {
    const session = this.sessions.get(id);
    if (session && this.isExpired(session, now)) {
      this.sessions.delete(id);
      return undefined;
    }
    return session;
  }

  private isExpired(session: StoredSession, now: number): boolean {
    return this.config.ttlMs > 0 && now - session.lastActiveAt > this.config.ttlMs;
  }
}

function snapshot(session: StoredSession): SessionHistory {
  return {
    id: session.id,
    messages: session.messages.map((message) => ({ ...message })),
    createdAt: new Date(session.createdAt),
    lastActiveAt: new Date(session.lastActiveAt),
  };
}
