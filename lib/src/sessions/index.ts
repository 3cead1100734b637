/**
 * Session Store Module
 */

export {
  ChatTurnSchema,
  type ChatTurn,
  type SessionHistory,
  type SessionStore,
  SessionStoreConfigSchema,
  type SessionStoreConfig,
} from './types.js';

export { type InMemorySessionStoreOptions, InMemorySessionStore } from './in-memory-store.js';
