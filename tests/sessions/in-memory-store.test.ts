/**
 * Tests for the in-memory session store
 */

import { describe, it, expect } from 'vitest';

import { InMemorySessionStore } from '../../lib/src/sessions/index.js';

function clock(start = 1_000) {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
}

describe('InMemorySessionStore', () => {
  it('should create an empty session on first access', () => {
    const store = new InMemorySessionStore();

    const session = store.getOrCreate('s1');

    expect(session.id).toBe('s1');
    expect(session.messages).toEqual([]);
    expect(store.size()).toBe(1);
  });

  it('should keep history per session', () => {
    const store = new InMemorySessionStore();

    store.append('s1', { role: 'user', content: 'How many vacation days?' });
    store.append('s1', { role: 'assistant', content: 'Fifteen.' });
    store.append('s2', { role: 'user', content: 'What is the dress code?' });

    expect(store.getOrCreate('s1').messages).toEqual([
      { role: 'user', content: 'How many vacation days?' },
      { role: 'assistant', content: 'Fifteen.' },
    ]);
    expect(store.getOrCreate('s2').messages).toEqual([
      { role: 'user', content: 'What is the dress code?' },
    ]);
  });

  it('should return copies that do not change the stored history', () => {
    const store = new InMemorySessionStore();
    store.append('s1', { role: 'user', content: 'Hello' });

    const history = store.getOrCreate('s1');
    history.messages.push({ role: 'assistant', content: 'injected' });
    const first = history.messages[0];
    if (first) {
      first.content = 'changed';
    }

    expect(store.get('s1')?.messages).toEqual([{ role: 'user', content: 'Hello' }]);
  });

  it('should return undefined from get for unknown ids without creating them', () => {
    const store = new InMemorySessionStore();
    expect(store.get('missing')).toBeUndefined();
    expect(store.size()).toBe(0);
  });

  it('should trim history to the most recent messages', () => {
    const store = new InMemorySessionStore({ maxHistoryMessages: 2 });

    store.append(
      's1',
      { role: 'user', content: 'one' },
      { role: 'assistant', content: 'two' },
      { role: 'user', content: 'three' }
    );

    expect(store.get('s1')?.messages.map((message) => message.content)).toEqual(['two', 'three']);
  });

  it('should never expire sessions when ttl is zero', () => {
    const time = clock();
    const store = new InMemorySessionStore({ now: time.now });
    store.append('s1', { role: 'user', content: 'Hello' });

    time.advance(365 * 24 * 60 * 60 * 1000);

    expect(store.get('s1')?.messages).toHaveLength(1);
    expect(store.pruneExpired()).toBe(0);
  });

  it('should evict idle sessions after the ttl', () => {
    const time = clock();
    const store = new InMemorySessionStore({ ttlMs: 1_000, now: time.now });
    store.append('s1', { role: 'user', content: 'Hello' });

    time.advance(1_000);
    expect(store.get('s1')?.messages).toHaveLength(1);

    time.advance(1);
    expect(store.get('s1')).toBeUndefined();
    expect(store.getOrCreate('s1').messages).toEqual([]);
  });

  it('should refresh activity on access', () => {
    const time = clock();
    const store = new InMemorySessionStore({ ttlMs: 1_000, now: time.now });
    store.append('s1', { role: 'user', content: 'Hello' });

    time.advance(800);
    store.getOrCreate('s1');
    time.advance(800);

    expect(store.get('s1')?.messages).toHaveLength(1);
  });

  it('should prune only expired sessions', () => {
    const time = clock();
    const store = new InMemorySessionStore({ ttlMs: 1_000, now: time.now });
    store.getOrCreate('old');
    time.advance(900);
    store.getOrCreate('recent');
    time.advance(200);

    expect(store.pruneExpired()).toBe(1);
    expect(store.size()).toBe(1);
    expect(store.get('recent')).toBeDefined();
  });

  it('should delete and clear sessions', () => {
    const store = new InMemorySessionStore();
    store.getOrCreate('s1');
    store.getOrCreate('s2');

    expect(store.delete('s1')).toBe(true);
    expect(store.delete('s1')).toBe(false);
    store.clear();
    expect(store.size()).toBe(0);
  });
});
