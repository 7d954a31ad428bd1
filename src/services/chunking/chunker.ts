/**
 * Paragraph-aware text chunking for the vector leg
 *
 * Splits at the last paragraph break inside the window, falling back to a
 * sentence end, a line break, then any space. Consecutive chunks overlap by
 * overlapPercent of chunkSize.
 *
 * @module services/chunking/chunker
 */

import { countWords } from '../../utils/text.js';

export interface ChunkingConfig {
  /** Maximum characters per chunk (default: 2000) */
  chunkSize: number;
  /** Overlap percentage between chunks (default: 10) */
  overlapPercent: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 2000,
  overlapPercent: 10,
};

export interface TextChunk {
  /** 0-indexed position */
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  wordCount: number;
}

export function getOverlapCharacters(config: ChunkingConfig): number {
  return Math.floor((config.chunkSize * config.overlapPercent) / 100);
}

/**
 * Position (absolute, exclusive) to end a chunk that starts at `start`.
 * Never returns a position at or before `start + chunkSize / 2`, so every
 * chunk makes progress.
 */
function findSplitPosition(text: string, start: number, chunkSize: number): number {
  const maxPos = start + chunkSize;
  const floor = start + Math.floor(chunkSize / 2);

  // Priority 1: paragraph break
  for (let i = maxPos - 1; i > floor; i--) {
    if (text[i] === '\n' && text[i - 1] === '\n') {
      return i + 1;
    }
  }

  // Priority 2: sentence ending followed by whitespace
  for (let i = maxPos - 1; i > floor; i--) {
    const ch = text[i - 1];
    if ((ch === '.' || ch === '?' || ch === '!') && /\s/.test(text[i])) {
      return i + 1;
    }
  }

  // Priority 3: line break
  for (let i = maxPos - 1; i > floor; i--) {
    if (text[i] === '\n') {
      return i + 1;
    }
  }

  // Priority 4: any space
  for (let i = maxPos - 1; i > floor; i--) {
    if (text[i] === ' ') {
      return i + 1;
    }
  }

  // Last resort: force split at maxPos
  return maxPos;
}

/**
 * Chunk `text` for embedding. Whitespace-only input yields no chunks.
 */
export function chunkText(text: string, config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG): TextChunk[] {
  if (!Number.isInteger(config.chunkSize) || config.chunkSize < 2) {
    throw new Error(`chunkSize must be an integer >= 2, got ${config.chunkSize}`);
  }
  if (config.overlapPercent < 0 || config.overlapPercent >= 50) {
    throw new Error(`overlapPercent must be in [0, 50), got ${config.overlapPercent}`);
  }

  const chunks: TextChunk[] = [];
  if (text.trim().length === 0) return chunks;

  const overlap = getOverlapCharacters(config);
  let start = 0;

  while (start < text.length) {
    const end =
      text.length - start <= config.chunkSize
        ? text.length
        : findSplitPosition(text, start, config.chunkSize);
    const slice = text.slice(start, end);
    if (slice.trim().length > 0) {
      chunks.push({
        index: chunks.length,
        text: slice,
        startOffset: start,
        endOffset: end,
        wordCount: countWords(slice),
      });
    }
    if (end >= text.length) break;
    start = Math.max(start + 1, end - overlap);
  }

  return chunks;
}
