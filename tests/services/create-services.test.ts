/**
 * Tests for the service graph wiring
 */

import { describe, it, expect } from 'vitest';

import { createTestServices } from '../helpers/services.js';

describe('createServices', () => {
  it('should carry configuration into every component', () => {
    const { services } = createTestServices({
      RETRIEVAL_TOP_K: '7',
      CHAT_TEMPERATURE: '0.1',
      CHUNK_SIZE: '500',
      CHUNK_OVERLAP: '50',
      QDRANT_COLLECTION: 'policies',
    });

    expect(services.vectorStore.getConfig()).toMatchObject({
      collectionName: 'policies',
      vectorDimensions: 8,
      chunkSize: 500,
      chunkOverlap: 50,
      defaultSearchLimit: 7,
    });
    expect(services.chain.getConfig()).toMatchObject({ topK: 7, temperature: 0.1 });
    expect(services.llm.model).toBe('gpt-4o-mini');
    expect(services.llm.getConfig().temperature).toBe(0.1);
    expect(services.embedder.dimensions).toBe(8);
  });

  it('should answer from uploaded documents end to end', async () => {
    const { services, embeddingsCreate, chatCreate } = createTestServices();

    await services.admin.uploadDocument({ buffer: Buffer.from('%PDF-1.7'), fileName: 'handbook.pdf' }, 'policy');
    const result = await services.chain.ask('How many sick days do staff get?', 'session-1');

    expect(embeddingsCreate.mock.calls[0]?.[0]).toMatchObject({
      model: 'text-embedding-3-small',
      dimensions: 8,
    });
    expect(chatCreate.mock.calls[0]?.[0]).toMatchObject({ model: 'gpt-4o-mini', temperature: 0.3 });
    expect(result.answer).toBe('Full-time staff get fifteen vacation days.');
    expect(result.sources).toHaveLength(4);
    expect(services.sessions.get('session-1')?.messages).toHaveLength(2);
  });

  it('should log through child loggers of the injected logger', async () => {
    const { services, lines } = createTestServices();

    await services.admin.uploadDocument({ buffer: Buffer.from('docx'), fileName: 'dress-code.docx' }, 'guide');

    const messages = lines.map((entry) => entry.line);
    expect(messages.some((line) => line.startsWith('INFO  [vector-store] Stored chunks'))).toBe(true);
    expect(messages.some((line) => line.startsWith('INFO  [admin] Uploaded document'))).toBe(true);
  });
});
