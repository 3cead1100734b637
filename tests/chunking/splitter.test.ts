/**
 * Tests for the recursive character splitter
 */

import { describe, it, expect } from 'vitest';

import {
  RecursiveTextSplitter,
  chunkDocuments,
  createDefaultChunkingConfig,
  reassembleChunks,
} from '../../lib/src/chunking/index.js';

function policyText(): string {
  const paragraphs: string[] = [];
  for (let i = 1; i <= 20; i++) {
    const sentences: string[] = [];
    for (let j = 1; j <= 6; j++) {
      sentences.push(`Section ${i}.${j} explains how employees request and record time away from work`);
    }
    paragraphs.push(sentences.join('. ') + '.');
  }
  return paragraphs.join('\n\n');
}

describe('createDefaultChunkingConfig', () => {
  it('should default to 1000 characters with 200 overlap', () => {
    const config = createDefaultChunkingConfig();
    expect(config.chunkSize).toBe(1000);
    expect(config.chunkOverlap).toBe(200);
    expect(config.separators).toEqual(['\n\n', '\n', '. ', ' ']);
  });

  it('should reject an overlap that is not smaller than the size', () => {
    expect(() => createDefaultChunkingConfig({ chunkSize: 100, chunkOverlap: 100 })).toThrow(
      'chunkOverlap must be smaller than chunkSize'
    );
  });
});

describe('RecursiveTextSplitter', () => {
  const splitter = new RecursiveTextSplitter();

  it('should bound every chunk, overlap consecutive chunks exactly and reassemble the text', () => {
    const text = policyText();
    const chunks = splitter.splitText(text);

    expect(chunks.length).toBeGreaterThan(3);
    for (const chunk of chunks) {
      expect(chunk.length).toBeLessThanOrEqual(1000);
    }
    for (let i = 1; i < chunks.length; i++) {
      const previous = chunks[i - 1] ?? '';
      const current = chunks[i] ?? '';
      expect(current.slice(0, 200)).toBe(previous.slice(-200));
    }
    expect(reassembleChunks(chunks, 200)).toBe(text);
  });

  it('should prefer paragraph breaks', () => {
    const first = 'a'.repeat(600);
    const second = 'b'.repeat(600);
    const spans = splitter.computeSpans(`${first}\n\n${second}`);

    expect(spans[0]).toEqual({ start: 0, end: 602 });
  });

  it('should fall back to a space when no paragraph or line break fits', () => {
    const small = new RecursiveTextSplitter({ chunkSize: 10, chunkOverlap: 2 });
    expect(small.splitText('alpha beta gamma')).toEqual(['alpha ', 'a beta ', 'a gamma']);
  });

  it('should split mid-word when there is no separator', () => {
    const small = new RecursiveTextSplitter({ chunkSize: 4, chunkOverlap: 1 });
    expect(small.splitText('abcdefghij')).toEqual(['abcd', 'defg', 'ghij']);
  });

  it('should keep characters outside the basic plane whole', () => {
    const small = new RecursiveTextSplitter({ chunkSize: 5, chunkOverlap: 1 });
    expect(small.splitText('ab😀😀😀😀')).toEqual(['ab😀', '😀😀', '😀😀', '😀😀']);
  });

  it('should keep the exact overlap when it already ends on a character boundary', () => {
    const small = new RecursiveTextSplitter({ chunkSize: 6, chunkOverlap: 2 });
    expect(small.computeSpans('😀😀😀😀😀')).toEqual([
      { start: 0, end: 6 },
      { start: 4, end: 10 },
    ]);
  });

  it('should return short text as a single chunk and empty text as none', () => {
    expect(splitter.splitText('Short policy.')).toEqual(['Short policy.']);
    expect(splitter.splitText('')).toEqual([]);
  });

  it('should be deterministic', () => {
    const text = policyText();
    expect(splitter.splitText(text)).toEqual(splitter.splitText(text));
  });
});

describe('chunkDocuments', () => {
  it('should copy metadata and index chunks within each document', () => {
    const metadata = { source: 'guide.docx', type: 'guide' as const, upload_date: '2024-01-15' };
    const chunks = chunkDocuments(
      [
        { content: 'abcdefghij', metadata },
        { content: 'klm', metadata: { ...metadata, page: 2 } },
      ],
      4,
      1
    );

    expect(chunks.map((chunk) => [chunk.content, chunk.index])).toEqual([
      ['abcd', 0],
      ['defg', 1],
      ['ghij', 2],
      ['klm', 0],
    ]);
    expect(chunks[3]?.metadata.page).toBe(2);
    expect(chunks[0]?.metadata).not.toBe(metadata);
  });
});
