/**
 * Chunking Types
 */

import { z } from 'zod';

// =============================================================================
// Configuration
// =============================================================================

/**
 * Separators tried in priority order: paragraph, line, sentence, word.
 * When none fits inside the window the split falls back to a character
 * boundary.
 */
export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' '];

export const ChunkingConfigSchema = z
  .object({
    /** Maximum characters per chunk */
    chunkSize: z.number().int().positive().default(1000),
    /** Characters shared between consecutive chunks */
    chunkOverlap: z.number().int().nonnegative().default(200),
    /** Break separators, highest priority first */
    separators: z.array(z.string().min(1)).default([...DEFAULT_SEPARATORS]),
  })
  .refine((config) => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;

export function createDefaultChunkingConfig(
  overrides?: Partial<ChunkingConfig>
): ChunkingConfig {
  return ChunkingConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Spans
// =============================================================================

/**
 * A chunk's position in its source text: `text.slice(start, end)`
 */
export interface TextSpan {
  start: number;
  end: number;
}

/**
 * Rebuild the source from chunk contents by dropping each later chunk's
 * overlap prefix.
 */
export function reassembleChunks(contents: readonly string[], chunkOverlap: number): string {
  return contents
    .map((content, index) => (index === 0 ? content : content.slice(chunkOverlap)))
    .join('');
}
