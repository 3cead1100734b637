export {
  DocumentType,
  DocumentTypeSchema,
  UploadDocumentTypeSchema,
  type UploadDocumentType,
  UploadDateSchema,
  DocumentMetadataSchema,
  type DocumentMetadata,
  type RawDocumentMetadata,
  type RawDocument,
  type Document,
  type Chunk,
  formatUploadDate,
} from './types.js';
