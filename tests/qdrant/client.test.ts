/**
 * Tests for Qdrant configuration, collection setup and health checks
 */

import { describe, it, expect, vi } from 'vitest';

import {
  SOURCE_FIELD,
  checkClusterHealth,
  ensureCollection,
  loadQdrantConfig,
} from '../../lib/src/qdrant/index.js';
import { FakeQdrantClient } from '../helpers/fake-qdrant.js';

const setup = { collectionName: 'hr_documents', vectorSize: 1536, distance: 'Cosine' } as const;

describe('loadQdrantConfig', () => {
  it('should derive collection settings from the environment', () => {
    const config = loadQdrantConfig({
      OPENAI_API_KEY: 'test-key',
      QDRANT_URL: 'http://localhost:6333',
      QDRANT_COLLECTION: 'policies',
      EMBEDDING_DIMENSIONS: '3072',
    });

    expect(config).toEqual({
      url: 'http://localhost:6333',
      collectionName: 'policies',
      vectorSize: 3072,
      distance: 'Cosine',
      timeout: 30000,
    });
  });

  it('should keep the API key when set', () => {
    const config = loadQdrantConfig({
      OPENAI_API_KEY: 'test-key',
      QDRANT_URL: 'https://cluster.example.com',
      QDRANT_API_KEY: 'test-qdrant-key',
    });
    expect(config.apiKey).toBe('test-qdrant-key');
  });

  it('should throw without QDRANT_URL', () => {
    expect(() => loadQdrantConfig({ OPENAI_API_KEY: 'test-key' })).toThrow();
  });
});

describe('ensureCollection', () => {
  it('should create the collection and the source index', async () => {
    const qdrant = new FakeQdrantClient();

    const result = await ensureCollection(qdrant.asClient(), setup);

    expect(result).toEqual({ created: true, indexCreated: true });
    const collection = qdrant.collections.get('hr_documents');
    expect(collection?.size).toBe(1536);
    expect(collection?.distance).toBe('Cosine');
    expect([...(collection?.indexes ?? [])]).toEqual([SOURCE_FIELD]);
  });

  it('should leave a complete collection untouched', async () => {
    const qdrant = new FakeQdrantClient();
    await ensureCollection(qdrant.asClient(), setup);
    const create = vi.spyOn(qdrant, 'createCollection');
    const index = vi.spyOn(qdrant, 'createPayloadIndex');

    const result = await ensureCollection(qdrant.asClient(), setup);

    expect(result).toEqual({ created: false, indexCreated: false });
    expect(create).not.toHaveBeenCalled();
    expect(index).not.toHaveBeenCalled();
  });

  it('should add the index to an existing collection that lacks it', async () => {
    const qdrant = new FakeQdrantClient();
    await qdrant.createCollection('hr_documents', { vectors: { size: 1536, distance: 'Cosine' } });

    const result = await ensureCollection(qdrant.asClient(), setup);

    expect(result).toEqual({ created: false, indexCreated: true });
    expect(qdrant.collections.get('hr_documents')?.indexes.has(SOURCE_FIELD)).toBe(true);
  });
});

describe('checkClusterHealth', () => {
  it('should report the collection count when reachable', async () => {
    const qdrant = new FakeQdrantClient();
    await ensureCollection(qdrant.asClient(), setup);

    const health = await checkClusterHealth(qdrant.asClient());

    expect(health.healthy).toBe(true);
    expect(health.collectionsCount).toBe(1);
    expect(health.latencyMs).toBeGreaterThanOrEqual(0);
  });

  it('should report the error when unreachable', async () => {
    const qdrant = new FakeQdrantClient();
    vi.spyOn(qdrant, 'getCollections').mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:6333'));

    const health = await checkClusterHealth(qdrant.asClient());

    expect(health).toEqual({ healthy: false, error: 'connect ECONNREFUSED 127.0.0.1:6333' });
  });
});
