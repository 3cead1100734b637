/**
 * Document Loaders Module
 */

export {
  type FileFormat,
  SUPPORTED_EXTENSIONS,
  resolveFormat,
  isSupportedFile,
  type PdfPageExtractor,
  type DocxTextExtractor,
  type TextExtractors,
} from './types.js';

export { extractPdfPages, renderPageText } from './pdf-loader.js';
export { extractDocxText } from './docx-loader.js';
export { DocumentLoader, annotate } from './document-loader.js';
