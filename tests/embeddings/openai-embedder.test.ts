/**
 * Tests for OpenAIEmbedder
 */

import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import type { CreateEmbeddingResponse, EmbeddingCreateParams } from 'openai/resources/embeddings';

import {
  EmbeddingError,
  OpenAIEmbedder,
  toBatches,
  type EmbeddingsClient,
} from '../../lib/src/embeddings/index.js';

function vectorFor(text: string, dimensions: number): number[] {
  return Array.from({ length: dimensions }, (_, i) => text.length + i);
}

function response(
  inputs: string[],
  dimensions: number,
  order: 'forward' | 'reverse' = 'forward'
): CreateEmbeddingResponse {
  const data = inputs.map((text, index) => ({
    object: 'embedding' as const,
    index,
    embedding: vectorFor(text, dimensions),
  }));
  return {
    object: 'list',
    model: 'text-embedding-3-small',
    data: order === 'reverse' ? data.reverse() : data,
    usage: { prompt_tokens: inputs.length, total_tokens: inputs.length },
  };
}

function inputsOf(body: EmbeddingCreateParams): string[] {
  return Array.isArray(body.input) ? body.input.map(String) : [String(body.input)];
}

function stubClient(
  handler: (body: EmbeddingCreateParams) => Promise<CreateEmbeddingResponse>
) {
  const create = vi.fn(handler);
  const client: EmbeddingsClient = { embeddings: { create } };
  return { client, create };
}

describe('OpenAIEmbedder', () => {
  it('should send model, dimensions and float encoding', async () => {
    const { client, create } = stubClient(async (body) => response(inputsOf(body), 4));
    const embedder = new OpenAIEmbedder({ client, dimensions: 4, timeoutMs: 5_000 });

    const vector = await embedder.embedQuery('vacation policy');

    expect(vector).toEqual([15, 16, 17, 18]);
    expect(create).toHaveBeenCalledWith(
      {
        model: 'text-embedding-3-small',
        input: ['vacation policy'],
        dimensions: 4,
        encoding_format: 'float',
      },
      { timeout: 5_000 }
    );
  });

  it('should batch documents and keep input order', async () => {
    const { client, create } = stubClient(async (body) => response(inputsOf(body), 2, 'reverse'));
    const embedder = new OpenAIEmbedder({ client, dimensions: 2, batchSize: 2 });

    const vectors = await embedder.embedDocuments(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

    expect(create).toHaveBeenCalledTimes(3);
    expect(create.mock.calls.map(([body]) => body.input)).toEqual([
      ['a', 'bb'],
      ['ccc', 'dddd'],
      ['eeeee'],
    ]);
    expect(vectors.map((vector) => vector[0])).toEqual([1, 2, 3, 4, 5]);
  });

  it('should not call the provider for an empty document list', async () => {
    const { client, create } = stubClient(async (body) => response(inputsOf(body), 2));
    const embedder = new OpenAIEmbedder({ client, dimensions: 2 });

    expect(await embedder.embedDocuments([])).toEqual([]);
    expect(create).not.toHaveBeenCalled();
  });

  it('should reject empty queries', async () => {
    const { client } = stubClient(async (body) => response(inputsOf(body), 2));
    const embedder = new OpenAIEmbedder({ client, dimensions: 2 });

    await expect(embedder.embedQuery('   ')).rejects.toMatchObject({
      name: 'EmbeddingError',
      code: 'EMPTY_INPUT',
    });
  });

  it('should reject responses with fewer vectors than inputs', async () => {
    const { client } = stubClient(async (body) => response(inputsOf(body).slice(1), 2));
    const embedder = new OpenAIEmbedder({ client, dimensions: 2 });

    await expect(embedder.embedDocuments(['a', 'b'])).rejects.toMatchObject({
      code: 'INCOMPLETE_RESPONSE',
      message: 'Expected 2 embeddings, received 1',
    });
  });

  it('should reject vectors of the wrong size', async () => {
    const { client } = stubClient(async (body) => response(inputsOf(body), 3));
    const embedder = new OpenAIEmbedder({ client, dimensions: 2 });

    await expect(embedder.embedQuery('a')).rejects.toMatchObject({
      code: 'DIMENSION_MISMATCH',
      message: 'Embedding dimension mismatch: expected 2, got 3',
    });
  });

  it('should map connection timeouts', async () => {
    const { client } = stubClient(async () => {
      throw new OpenAI.APIConnectionTimeoutError();
    });
    const embedder = new OpenAIEmbedder({ client, dimensions: 2, timeoutMs: 1_500 });

    await expect(embedder.embedQuery('a')).rejects.toMatchObject({
      code: 'TIMEOUT',
      message: 'Embedding request timed out after 1500ms',
    });
  });

  it('should map provider errors', async () => {
    const { client } = stubClient(async () => {
      throw new OpenAI.APIError(401, { message: 'Incorrect API key provided' }, undefined, undefined);
    });
    const embedder = new OpenAIEmbedder({ client, dimensions: 2 });

    const error = await embedder.embedQuery('a').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({ code: 'PROVIDER_ERROR' });
    expect(error instanceof Error && error.message).toMatch(
      /^Embedding request failed: .*Incorrect API key provided$/
    );
  });

  it('should wrap unknown failures', async () => {
    const { client } = stubClient(async () => {
      throw new Error('socket closed');
    });
    const embedder = new OpenAIEmbedder({ client, dimensions: 2 });

    await expect(embedder.embedQuery('a')).rejects.toMatchObject({
      code: 'UNKNOWN',
      message: 'socket closed',
    });
  });

  it('should expose its configuration', () => {
    const { client } = stubClient(async (body) => response(inputsOf(body), 2));
    const embedder = new OpenAIEmbedder({ client, dimensions: 2, batchSize: 10 });

    expect(embedder.dimensions).toBe(2);
    expect(embedder.batchSize).toBe(10);
    expect(embedder.getConfig().model).toBe('text-embedding-3-small');
  });
});

describe('toBatches', () => {
  it('should split into consecutive groups', () => {
    expect(toBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(toBatches([], 3)).toEqual([]);
  });
});
