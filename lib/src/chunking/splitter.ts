/**
 * Recursive Character Text Splitter
 *
 * Splits text into windows of at most `chunkSize` characters. Each window
 * ends at the last paragraph break it contains; failing that the last line
 * break, then sentence end, then space, and only then mid-word. The next
 * window starts `chunkOverlap` characters before the previous one ended, so
 * consecutive chunks share exactly that many characters and the source can
 * be rebuilt from the chunks.
 *
 * Boundaries never fall inside a surrogate pair. A window end that would cut
 * one moves back a unit, and an overlap that would cut one widens to take
 * the whole character.
 */

import type { Chunk, Document } from '../documents/types.js';
import {
  createDefaultChunkingConfig,
  type ChunkingConfig,
  type TextSpan,
} from './types.js';

export class RecursiveTextSplitter {
  private readonly config: ChunkingConfig;

  constructor(config?: Partial<ChunkingConfig>) {
    this.config = createDefaultChunkingConfig(config);
  }

  getConfig(): Readonly<ChunkingConfig> {
    return this.config;
  }

  /**
   * Compute chunk boundaries for a text. Empty text yields no spans.
   */
  computeSpans(text: string): TextSpan[] {
    const { chunkSize, chunkOverlap } = this.config;
    const spans: TextSpan[] = [];
    let start = 0;

    while (start < text.length) {
      if (text.length - start <= chunkSize) {
        spans.push({ start, end: text.length });
        break;
      }

      // end must pass start + overlap so the next window moves forward
      const minEnd = start + chunkOverlap;
      let end = this.findBreak(text, start, start + chunkSize, minEnd);
      if (splitsSurrogatePair(text, end)) {
        end = end - 1 > minEnd ? end - 1 : end + 1;
      }
      spans.push({ start, end });

      let next = end - chunkOverlap;
      if (splitsSurrogatePair(text, next)) {
        next = next - 1 > start ? next - 1 : next + 1;
      }
      start = next;
    }

    return spans;
  }

  splitText(text: string): string[] {
    return this.computeSpans(text).map((span) => text.slice(span.start, span.end));
  }

  /**
   * Split documents into chunks; each chunk keeps its parent's metadata.
   * Documents with empty content produce no chunks.
   */
  splitDocuments(documents: readonly Document[]): Chunk[] {
    const chunks: Chunk[] = [];

    for (const document of documents) {
      this.splitText(document.content).forEach((content, index) => {
        chunks.push({
          content,
          metadata: { ...document.metadata },
          index,
        });
      });
    }

    return chunks;
  }

  /**
   * Last separator occurrence inside `[start, limit)` whose end lies past
   * `minEnd`, trying separators in priority order. Falls back to `limit`.
   */
  private findBreak(text: string, start: number, limit: number, minEnd: number): number {
    const window = text.slice(start, limit);

    for (const separator of this.config.separators) {
      const index = window.lastIndexOf(separator);
      if (index === -1) {
        continue;
      }
      const end = start + index + separator.length;
      if (end > minEnd) {
        return end;
      }
    }

    return limit;
  }
}

/**
 * True when `index` sits between the two halves of a surrogate pair
 */
function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) {
    return false;
  }
  const high = text.charCodeAt(index - 1);
  const low = text.charCodeAt(index);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/**
 * Split documents with a one-off splitter
 */
export function chunkDocuments(
  documents: readonly Document[],
  chunkSize?: number,
  chunkOverlap?: number
): Chunk[] {
  const splitter = new RecursiveTextSplitter({
    ...(chunkSize !== undefined && { chunkSize }),
    ...(chunkOverlap !== undefined && { chunkOverlap }),
  });
  return splitter.splitDocuments(documents);
}
