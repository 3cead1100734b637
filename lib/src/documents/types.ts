/**
 * Document Model
 *
 * Documents are produced by the loaders (one per PDF page, one per DOCX
 * file) and by the scraper (one per URL). Chunks are bounded slices of a
 * document carrying the parent's metadata.
 */

import { z } from 'zod';

// =============================================================================
// Document Types
// =============================================================================

export const DocumentType = {
  DOCUMENT: 'document',
  POLICY: 'policy',
  GUIDE: 'guide',
  ARTICLE: 'article',
  WEBPAGE: 'webpage',
} as const;

export type DocumentType = (typeof DocumentType)[keyof typeof DocumentType];

export const DocumentTypeSchema = z.enum(['document', 'policy', 'guide', 'article', 'webpage']);

/** Types an admin may pick for an uploaded file; `webpage` is set by the scraper */
export const UploadDocumentTypeSchema = z.enum(['document', 'policy', 'guide', 'article']);

export type UploadDocumentType = z.infer<typeof UploadDocumentTypeSchema>;

/** Calendar date in YYYY-MM-DD form */
export const UploadDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

// =============================================================================
// Metadata
// =============================================================================

export const DocumentMetadataSchema = z.object({
  /** Grouping key for listing and deletion (file name or URL) */
  source: z.string().min(1),
  type: DocumentTypeSchema,
  upload_date: UploadDateSchema,
  /** 1-based page number for paged formats */
  page: z.number().int().positive().optional(),
});

export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>;

/**
 * Metadata as it exists before annotation: loaders know the origin and
 * page, not the admin-chosen source name, type or date.
 */
export interface RawDocumentMetadata {
  origin: string;
  page?: number;
}

export interface RawDocument {
  content: string;
  metadata: RawDocumentMetadata;
}

export interface Document {
  content: string;
  metadata: DocumentMetadata;
}

export interface Chunk {
  content: string;
  metadata: DocumentMetadata;
  /** 0-based position of the chunk within its parent document */
  index: number;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Format a date as YYYY-MM-DD in local time
 */
export function formatUploadDate(date: Date = new Date()): string {
  const year = date.getFullYear().toString().padStart(4, '0');
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `${year}-${month}-${day}`;
}
