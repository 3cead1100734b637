#!/usr/bin/env tsx
/**
 * Bulk Document Ingestion Script
 *
 * Walks a directory for .pdf and .docx files and uploads each one as a
 * source named after the file. Files whose source already has records are
 * skipped unless --force is given, in which case they are replaced.
 *
 * Usage:
 *   npm run ingest-documents -- <dir> [--type policy] [--force]
 *
 * Options:
 *   --type=TYPE   document | policy | guide | article (default: document)
 *   --force       Replace sources that already exist
 */

import { readdir } from 'node:fs/promises';
import path from 'node:path';

import {
  type Services,
  type UploadDocumentType,
  UploadDocumentTypeSchema,
  createServices,
  isKnowledgeBaseError,
  isSupportedFile,
  loadAppConfig,
} from '@hr-assistant/lib';

import { loadEnvironment, parseFlags, printBanner, requireValidEnv } from './shared.js';

async function findDocuments(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await findDocuments(fullPath)));
    } else if (entry.isFile() && isSupportedFile(entry.name)) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

async function ingestFile(
  services: Services,
  file: string,
  docType: UploadDocumentType,
  force: boolean
): Promise<'uploaded' | 'replaced' | 'skipped'> {
  const source = path.basename(file);
  const existing = await services.vectorStore.countBySource(source);

  if (existing > 0 && !force) {
    console.log(`  - ${source}: already ingested (${existing} chunks), skipped`);
    return 'skipped';
  }

  const result =
    existing > 0
      ? await services.admin.updateDocument(source, { input: file, docType })
      : await services.admin.uploadDocument(file, docType);

  const failures = result.failed.length > 0 ? `, ${result.failed.length} failed` : '';
  console.log(`  ✓ ${source}: ${result.storedCount}/${result.chunkCount} chunks stored${failures}`);
  return existing > 0 ? 'replaced' : 'uploaded';
}

async function main(): Promise<void> {
  loadEnvironment();
  const { positional, flags } = parseFlags(process.argv.slice(2), ['type']);
  const dir = positional[0];

  if (!dir || flags.has('help')) {
    console.log('Usage: npm run ingest-documents -- <dir> [--type policy] [--force]');
    process.exit(dir ? 0 : 1);
  }

  const typeFlag = flags.get('type');
  const docType = UploadDocumentTypeSchema.safeParse(typeof typeFlag === 'string' ? typeFlag : 'document');
  if (!docType.success) {
    console.error(`ERROR: --type must be one of ${UploadDocumentTypeSchema.options.join(', ')}`);
    process.exit(1);
  }
  const force = flags.get('force') === true;

  printBanner('Ingest Documents');
  requireValidEnv();

  const services = createServices(loadAppConfig());
  const files = await findDocuments(path.resolve(dir));

  console.log(`Found ${files.length} document(s) in ${dir}`);
  console.log(`Type: ${docType.data}${force ? ' (force)' : ''}`);
  console.log('');

  const totals = { uploaded: 0, replaced: 0, skipped: 0, failed: 0 };

  for (const file of files) {
    try {
      totals[await ingestFile(services, file, docType.data, force)]++;
    } catch (error) {
      totals.failed++;
      const code = isKnowledgeBaseError(error) ? error.code : 'ERROR';
      const message = error instanceof Error ? error.message : String(error);
      console.error(`  ✗ ${path.basename(file)}: [${code}] ${message}`);
    }
  }

  console.log('');
  console.log(
    `Done: ${totals.uploaded} uploaded, ${totals.replaced} replaced, ${totals.skipped} skipped, ${totals.failed} failed`
  );
  process.exit(totals.failed > 0 ? 1 : 0);
}

main().catch((error: unknown) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
