/**
 * Sources API Endpoint (admin)
 *
 * GET    /api/sources            → { sources: SourceSummary[] }
 * DELETE /api/sources?name=...   → { deleted: string }
 */

import { z } from 'zod';

import { createHandler } from './_shared/http.js';

const DeleteQuerySchema = z.object({
  name: z
    .string({ required_error: 'name is required', invalid_type_error: 'name must be a single value' })
    .trim()
    .min(1, 'name cannot be empty'),
});

export default createHandler(
  { name: 'sources', methods: ['GET', 'DELETE'], admin: true },
  async ({ req, res, services }) => {
    if (req.method === 'GET') {
      const sources = await services.admin.listSources();
      res.status(200).json({ sources });
      return;
    }

    const { name } = DeleteQuerySchema.parse(req.query);
    await services.admin.deleteSource(name);
    res.status(200).json({ deleted: name });
  }
);
