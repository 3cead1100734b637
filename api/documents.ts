/**
 * Documents API Endpoint (admin)
 *
 * POST /api/documents
 * Request: { fileName, contentBase64, docType?, sourceName? }
 *
 * PUT /api/documents
 * Request: { oldName, fileName, contentBase64, docType?, sourceName? }
 *
 * Files travel base64-encoded in the JSON body. Only PDF and DOCX are accepted.
 */

import { z } from 'zod';
import { type FailedChunk, type UploadResult, UploadDocumentTypeSchema } from '@hr-assistant/lib';

import { createHandler } from './_shared/http.js';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const UploadSchema = z.object({
  fileName: z.string({ required_error: 'fileName is required' }).trim().min(1, 'fileName cannot be empty'),
  contentBase64: z
    .string({ required_error: 'contentBase64 is required' })
    .transform((value) => value.replace(/\s+/g, ''))
    .refine((value) => value.length > 0, { message: 'contentBase64 cannot be empty' })
    .refine((value) => BASE64_PATTERN.test(value), { message: 'contentBase64 must be base64 encoded' }),
  docType: UploadDocumentTypeSchema.default('document'),
  sourceName: z.string().trim().min(1).optional(),
});

const UpdateSchema = UploadSchema.extend({
  oldName: z.string({ required_error: 'oldName is required' }).trim().min(1, 'oldName cannot be empty'),
});

export interface FailedChunkSummary {
  index: number;
  page?: number;
  reason: string;
}

export function summarizeFailures(failed: readonly FailedChunk[]): FailedChunkSummary[] {
  return failed.map(({ chunk, reason }) => ({
    index: chunk.index,
    ...(chunk.metadata.page !== undefined && { page: chunk.metadata.page }),
    reason,
  }));
}

function toResponse<T extends UploadResult>(result: T): Omit<T, 'failed'> & { failed: FailedChunkSummary[] } {
  return { ...result, failed: summarizeFailures(result.failed) };
}

export default createHandler(
  { name: 'documents', methods: ['POST', 'PUT'], admin: true },
  async ({ req, res, services }) => {
    if (req.method === 'POST') {
      const body = UploadSchema.parse(req.body);
      const result = await services.admin.uploadDocument(
        { buffer: Buffer.from(body.contentBase64, 'base64'), fileName: body.fileName },
        body.docType,
        body.sourceName
      );
      res.status(201).json(toResponse(result));
      return;
    }

    const body = UpdateSchema.parse(req.body);
    const result = await services.admin.updateDocument(body.oldName, {
      input: { buffer: Buffer.from(body.contentBase64, 'base64'), fileName: body.fileName },
      docType: body.docType,
      sourceName: body.sourceName,
    });
    res.status(200).json(toResponse(result));
  }
);
