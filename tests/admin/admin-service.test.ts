/**
 * Tests for AdminService over the vector store and an in-memory Qdrant
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';

import { AdminService } from '../../lib/src/admin/index.js';
import { formatUploadDate, type UploadDocumentType } from '../../lib/src/documents/index.js';
import { DocumentLoader } from '../../lib/src/loaders/index.js';
import { VectorStoreService } from '../../lib/src/qdrant/index.js';
import { WebScraper } from '../../lib/src/scraper/index.js';
import { FakeQdrantClient } from '../helpers/fake-qdrant.js';
import { FakeEmbedder } from '../helpers/fake-embedder.js';
import { createTestLogger } from '../helpers/logger.js';

const HANDBOOK_PAGES = [
  'Welcome to the organization. This handbook covers employment basics.',
  'Vacation: full-time staff accrue fifteen days per year.',
  'Sick leave: staff may take up to ten paid sick days.',
];

function pdfUpload(fileName: string) {
  return { buffer: Buffer.from('%PDF-1.7 test'), fileName };
}

describe('AdminService', () => {
  let qdrant: FakeQdrantClient;
  let embedder: FakeEmbedder;
  let pdf: Mock<(buffer: Buffer) => Promise<string[]>>;
  let docx: Mock<(buffer: Buffer) => Promise<string>>;
  let scraper: WebScraper;
  let admin: AdminService;

  beforeEach(() => {
    const { logger } = createTestLogger();
    qdrant = new FakeQdrantClient();
    embedder = new FakeEmbedder(8);
    const store = new VectorStoreService(
      { collectionName: 'test_docs', vectorDimensions: 8, batchSize: 2 },
      { client: qdrant.asClient(), embedder, logger }
    );
    pdf = vi.fn(async (_buffer: Buffer) => HANDBOOK_PAGES);
    docx = vi.fn(async (_buffer: Buffer) => 'Remote work is allowed two days per week.');
    scraper = new WebScraper(
      { scrape: async () => '# Benefits\n\nDental coverage starts after ninety days.' },
      store,
      logger
    );
    admin = new AdminService({
      store,
      scraper,
      loader: new DocumentLoader({ pdf, docx }, logger),
      logger,
    });
  });

  // ===========================================================================
  // Upload & listing
  // ===========================================================================

  describe('uploadDocument', () => {
    it('should store one chunk per short page and list the source', async () => {
      const result = await admin.uploadDocument(pdfUpload('handbook.pdf'), 'policy');

      expect(result).toEqual({
        source: 'handbook.pdf',
        documentCount: 3,
        chunkCount: 3,
        storedCount: 3,
        failed: [],
      });
      expect(await admin.listSources()).toEqual([
        { name: 'handbook.pdf', type: 'policy', date: formatUploadDate(), chunkCount: 3 },
      ]);
    });

    it('should list a three-page PDF uploaded as a plain document', async () => {
      const result = await admin.uploadDocument(pdfUpload('onboarding.pdf'), 'document');

      expect(result.chunkCount).toBe(3);
      expect(await admin.listSources()).toEqual([
        { name: 'onboarding.pdf', type: 'document', date: formatUploadDate(), chunkCount: 3 },
      ]);
    });

    it('should keep page numbers on stored records', async () => {
      await admin.uploadDocument(pdfUpload('handbook.pdf'), 'policy');

      const pages = [...qdrant.points.values()].map((point) => {
        const metadata = point.payload['metadata'];
        return typeof metadata === 'object' && metadata !== null && 'page' in metadata ? metadata.page : undefined;
      });
      expect(pages).toEqual([1, 2, 3]);
    });

    it('should use a custom source name when given', async () => {
      const result = await admin.uploadDocument(
        { buffer: Buffer.from('docx'), fileName: 'uploads/remote-work.docx' },
        'guide',
        '  Remote Work Guide  '
      );

      expect(result.source).toBe('Remote Work Guide');
      expect(await admin.listSources()).toEqual([
        { name: 'Remote Work Guide', type: 'guide', date: formatUploadDate(), chunkCount: 1 },
      ]);
    });

    it('should default the source name to the base name of the file', async () => {
      const result = await admin.uploadDocument(pdfUpload('uploads/2024/handbook.pdf'), 'document');
      expect(result.source).toBe('handbook.pdf');
    });

    it('should reject unknown document types', async () => {
      await expect(
        admin.uploadDocument(pdfUpload('handbook.pdf'), 'webpage' as UploadDocumentType)
      ).rejects.toMatchObject({ code: 'INVALID_INPUT', message: 'Invalid document type: webpage' });
      expect(pdf).not.toHaveBeenCalled();
    });

    it('should reject unsupported formats', async () => {
      await expect(
        admin.uploadDocument({ buffer: Buffer.from('a,b'), fileName: 'staff.csv' }, 'document')
      ).rejects.toMatchObject({
        code: 'UNSUPPORTED_FORMAT',
        message: 'Unsupported file type .csv: only PDF and DOCX are accepted',
      });
    });

    it('should report unreadable files as UNSUPPORTED_FORMAT', async () => {
      pdf.mockRejectedValueOnce(new Error('bad XRef entry'));

      await expect(admin.uploadDocument(pdfUpload('broken.pdf'), 'policy')).rejects.toMatchObject({
        code: 'UNSUPPORTED_FORMAT',
        message: 'Failed to read broken.pdf: bad XRef entry',
      });
    });

    it('should report partial storage failures', async () => {
      embedder.failingCalls.add(2);

      const result = await admin.uploadDocument(pdfUpload('handbook.pdf'), 'policy');

      expect(result.storedCount).toBe(2);
      expect(result.failed.map((failure) => failure.chunk.metadata.page)).toEqual([3]);
      expect(result.failed[0]?.reason).toBe('Embedding failed: Embedding provider unavailable');
    });

    it('should fail when nothing could be stored', async () => {
      embedder.failingCalls.add(1);
      embedder.failingCalls.add(2);

      await expect(admin.uploadDocument(pdfUpload('handbook.pdf'), 'policy')).rejects.toMatchObject({
        code: 'STORAGE_FAILED',
        message: 'Failed to store handbook.pdf: Embedding failed: Embedding provider unavailable',
      });
      expect(await admin.listSources()).toEqual([]);
    });
  });

  describe('listSources', () => {
    it('should sort sources by name', async () => {
      await admin.uploadDocument(pdfUpload('b-handbook.pdf'), 'policy');
      await admin.uploadDocument({ buffer: Buffer.from('docx'), fileName: 'a-remote.docx' }, 'guide');

      expect((await admin.listSources()).map((source) => source.name)).toEqual([
        'a-remote.docx',
        'b-handbook.pdf',
      ]);
    });

    it('should group records without metadata as Unknown', async () => {
      qdrant.seed('legacy-1', { text: 'imported elsewhere' });

      expect(await admin.listSources()).toEqual([
        { name: 'Unknown', type: 'Unknown', date: 'Unknown', chunkCount: 1 },
      ]);
    });

    it('should wrap store failures', async () => {
      vi.spyOn(qdrant, 'scroll').mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:6333'));

      await expect(admin.listSources()).rejects.toMatchObject({
        code: 'STORAGE_FAILED',
        message: 'Failed to list sources: connect ECONNREFUSED 127.0.0.1:6333',
      });
    });
  });

  // ===========================================================================
  // Delete & update
  // ===========================================================================

  describe('deleteSource', () => {
    it('should remove every record of the source only', async () => {
      await admin.uploadDocument(pdfUpload('handbook.pdf'), 'policy');
      await admin.uploadDocument({ buffer: Buffer.from('docx'), fileName: 'remote.docx' }, 'guide');

      await admin.deleteSource('handbook.pdf');

      expect((await admin.listSources()).map((source) => source.name)).toEqual(['remote.docx']);
    });

    it('should accept an unknown source', async () => {
      await expect(admin.deleteSource('never-uploaded.pdf')).resolves.toBeUndefined();
    });

    it('should reject a blank name', async () => {
      await expect(admin.deleteSource('  ')).rejects.toMatchObject({
        code: 'INVALID_INPUT',
        message: 'Source name must not be empty',
      });
    });
  });

  describe('updateDocument', () => {
    it('should replace the old source with the new file', async () => {
      await admin.uploadDocument(pdfUpload('handbook.pdf'), 'policy');
      pdf.mockResolvedValueOnce(['Revised vacation policy.', 'Revised sick leave policy.']);

      const result = await admin.updateDocument('handbook.pdf', {
        input: pdfUpload('handbook-2025.pdf'),
        docType: 'policy',
      });

      expect(result).toEqual({
        source: 'handbook-2025.pdf',
        documentCount: 2,
        chunkCount: 2,
        storedCount: 2,
        failed: [],
        replaced: 'handbook.pdf',
        removedCount: 3,
      });
      expect(await admin.listSources()).toEqual([
        { name: 'handbook-2025.pdf', type: 'policy', date: formatUploadDate(), chunkCount: 2 },
      ]);
    });

    it('should fail with NOT_FOUND when the old source has no records', async () => {
      await expect(
        admin.updateDocument('missing.pdf', { input: pdfUpload('new.pdf'), docType: 'policy' })
      ).rejects.toMatchObject({ code: 'NOT_FOUND', message: 'No records found for missing.pdf' });
      expect(pdf).not.toHaveBeenCalled();
    });

    it('should keep the old source when the new file cannot be read', async () => {
      await admin.uploadDocument(pdfUpload('handbook.pdf'), 'policy');
      pdf.mockRejectedValueOnce(new Error('bad XRef entry'));

      await expect(
        admin.updateDocument('handbook.pdf', { input: pdfUpload('handbook-2025.pdf'), docType: 'policy' })
      ).rejects.toMatchObject({ code: 'UNSUPPORTED_FORMAT' });
      expect(await admin.listSources()).toEqual([
        { name: 'handbook.pdf', type: 'policy', date: formatUploadDate(), chunkCount: 3 },
      ]);
    });
  });

  // ===========================================================================
  // Scraping
  // ===========================================================================

  describe('scraping', () => {
    it('should delegate single and batch scrapes', async () => {
      const single = await admin.scrapeUrl('https://hr.example.org/benefits');
      const batch = await admin.scrapeUrls('https://hr.example.org/benefits\nhttps://hr.example.org/dental', true);

      expect(single).toEqual({
        url: 'https://hr.example.org/benefits',
        chunkCount: 1,
        storedCount: 1,
        failed: [],
      });
      expect(batch.succeeded.map((result) => result.url)).toEqual([
        'https://hr.example.org/benefits',
        'https://hr.example.org/dental',
      ]);
      expect(await admin.listSources()).toEqual([
        { name: 'https://hr.example.org/benefits', type: 'webpage', date: formatUploadDate(), chunkCount: 2 },
        { name: 'https://hr.example.org/dental', type: 'webpage', date: formatUploadDate(), chunkCount: 1 },
      ]);
    });
  });
});
