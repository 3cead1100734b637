/**
 * Tests for document loading and annotation
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';

import {
  DocumentLoader,
  annotate,
  extractDocxText,
  extractPdfPages,
  isSupportedFile,
  renderPageText,
  resolveFormat,
} from '../../lib/src/loaders/index.js';
import { formatUploadDate } from '../../lib/src/documents/index.js';
import { createTestLogger } from '../helpers/logger.js';

function loaderWith(pages: string[], docxText = '') {
  const pdf = vi.fn(async () => pages);
  const docx = vi.fn(async () => docxText);
  const loader = new DocumentLoader({ pdf, docx }, createTestLogger().logger);
  return { loader, pdf, docx };
}

describe('resolveFormat', () => {
  it('should resolve PDF and DOCX case-insensitively', () => {
    expect(resolveFormat('handbook.PDF')).toEqual({ kind: 'pdf' });
    expect(resolveFormat('benefits.docx')).toEqual({ kind: 'docx' });
  });

  it('should reject other extensions', () => {
    expect(() => resolveFormat('notes.txt')).toThrow(
      'Unsupported file type .txt: only PDF and DOCX are accepted'
    );
    expect(() => resolveFormat('README')).toThrow(
      'Unsupported file type: only PDF and DOCX are accepted'
    );
  });

  it('should report supported files', () => {
    expect(isSupportedFile('a.pdf')).toBe(true);
    expect(isSupportedFile('a.doc')).toBe(false);
  });
});

describe('DocumentLoader', () => {
  it('should produce one document per PDF page with text', async () => {
    const { loader } = loaderWith(['Page one text', '   ', 'Page three text']);

    const documents = await loader.loadBuffer(Buffer.from('%PDF-'), 'uploads/handbook.pdf');

    expect(documents).toEqual([
      { content: 'Page one text', metadata: { origin: 'handbook.pdf', page: 1 } },
      { content: 'Page three text', metadata: { origin: 'handbook.pdf', page: 3 } },
    ]);
  });

  it('should produce a single document for DOCX', async () => {
    const { loader, pdf } = loaderWith([], 'Remote work guidelines');

    const documents = await loader.loadBuffer(Buffer.from('docx'), 'remote.docx');

    expect(documents).toEqual([{ content: 'Remote work guidelines', metadata: { origin: 'remote.docx' } }]);
    expect(pdf).not.toHaveBeenCalled();
  });

  it('should reject files without extractable text', async () => {
    const { loader } = loaderWith(['', '  ']);

    await expect(loader.loadBuffer(Buffer.from('%PDF-'), 'scan.pdf')).rejects.toMatchObject({
      code: 'UNSUPPORTED_FORMAT',
      message: 'scan.pdf contains no extractable text',
    });
  });

  it('should reject unsupported extensions before extracting', async () => {
    const { loader, pdf, docx } = loaderWith(['text']);

    await expect(loader.loadBuffer(Buffer.from('x'), 'data.csv')).rejects.toMatchObject({
      code: 'UNSUPPORTED_FORMAT',
    });
    expect(pdf).not.toHaveBeenCalled();
    expect(docx).not.toHaveBeenCalled();
  });

  describe('load', () => {
    let dir = '';

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'loader-test-'));
      await writeFile(join(dir, 'leave.pdf'), '%PDF-1.4 test');
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should read the file and name documents after its base name', async () => {
      const { loader, pdf } = loaderWith(['Leave policy']);

      const documents = await loader.load(join(dir, 'leave.pdf'));

      expect(pdf).toHaveBeenCalledWith(Buffer.from('%PDF-1.4 test'));
      expect(documents).toEqual([{ content: 'Leave policy', metadata: { origin: 'leave.pdf', page: 1 } }]);
    });
  });
});

describe('annotate', () => {
  it('should stamp source, type and date and keep page numbers', () => {
    const documents = annotate(
      [
        { content: 'one', metadata: { origin: 'a.pdf', page: 1 } },
        { content: 'two', metadata: { origin: 'a.docx' } },
      ],
      'Employee Handbook',
      'policy',
      '2024-03-01'
    );

    expect(documents).toEqual([
      {
        content: 'one',
        metadata: { source: 'Employee Handbook', type: 'policy', upload_date: '2024-03-01', page: 1 },
      },
      {
        content: 'two',
        metadata: { source: 'Employee Handbook', type: 'policy', upload_date: '2024-03-01' },
      },
    ]);
  });

  it("should default to today's date", () => {
    const [document] = annotate([{ content: 'x', metadata: { origin: 'a.pdf' } }], 'a.pdf', 'document');
    expect(document?.metadata.upload_date).toBe(formatUploadDate());
  });
});

describe('formatUploadDate', () => {
  it('should pad month and day', () => {
    expect(formatUploadDate(new Date(2024, 0, 5))).toBe('2024-01-05');
  });
});

describe('extractors', () => {
  it('should reject empty and non-PDF buffers', async () => {
    await expect(extractPdfPages(Buffer.alloc(0))).rejects.toThrow('PDF file is empty');
    await expect(extractPdfPages(Buffer.from('hello world'))).rejects.toThrow(
      'Invalid PDF: file does not start with PDF header'
    );
  });

  it('should reject a PDF whose structure cannot be parsed', async () => {
    await expect(extractPdfPages(Buffer.from('%PDF-1.7 truncated'))).rejects.toMatchObject({
      code: 'UNSUPPORTED_FORMAT',
      message: expect.stringMatching(/^Invalid or corrupted PDF: /),
    });
  });

  it('should reject empty DOCX buffers', async () => {
    await expect(extractDocxText(Buffer.alloc(0))).rejects.toThrow('DOCX file is empty');
  });

  it('should start a new line when the vertical position changes', () => {
    expect(
      renderPageText([
        { str: 'Annual ', transform: [1, 0, 0, 1, 10, 700] },
        { str: 'leave', transform: [1, 0, 0, 1, 60, 700] },
        { str: 'Sick leave', transform: [1, 0, 0, 1, 10, 680] },
      ])
    ).toBe('Annual leave\nSick leave');
  });
});
