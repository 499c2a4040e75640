/**
 * Text Chunking Service
 *
 * Splits long text into overlapping segments for embedding and storage.
 * Windows back off to the last space so words are not cut, unless that space
 * sits in the first half of the window.
 *
 * @module services/chunking/chunker
 */

export interface ChunkingConfig {
  /** Maximum characters per chunk (default: 1000) */
  chunkSize: number;
  /** Characters shared by adjacent chunks (default: 200) */
  overlap: number;
}

export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  chunkSize: 1000,
  overlap: 200,
};

/**
 * Reject configurations that could stop the window from advancing.
 *
 * A window always keeps more than half of chunkSize, so an overlap of at most
 * half guarantees the next start is strictly greater than the current one.
 */
export function validateChunkingConfig(config: ChunkingConfig): void {
  if (!Number.isInteger(config.chunkSize) || config.chunkSize <= 0) {
    throw new Error(`chunkSize must be a positive integer, got ${config.chunkSize}`);
  }
  if (!Number.isInteger(config.overlap) || config.overlap < 0) {
    throw new Error(`overlap must be a non-negative integer, got ${config.overlap}`);
  }
  if (config.overlap > Math.floor(config.chunkSize / 2)) {
    throw new Error(
      `overlap (${config.overlap}) must not exceed half of chunkSize (${config.chunkSize})`
    );
  }
}

/**
 * Upper bound on the number of chunks chunkText() can return
 */
export function maxChunkCount(textLength: number, config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG): number {
  if (textLength <= config.chunkSize) return 1;
  return Math.ceil(textLength / (config.chunkSize - config.overlap));
}

/**
 * Chunk text into overlapping, word-boundary-respecting segments
 *
 * Algorithm:
 * 1. Text no longer than chunkSize comes back as a single trimmed chunk
 * 2. Slice [start, start + chunkSize)
 * 3. If the slice stops short of the end, cut it at its last space when that
 *    space lies past chunkSize / 2
 * 4. Emit the trimmed slice; the next window starts at end - overlap
 * 5. Stop once the next start reaches the end of the text
 *
 * @example
 * chunkText('...2500 chars without spaces...', { chunkSize: 1000, overlap: 200 });
 * // 4 chunks of 1000, 1000, 900 and 100 characters
 */
export function chunkText(text: string, config: ChunkingConfig = DEFAULT_CHUNKING_CONFIG): string[] {
  validateChunkingConfig(config);
  const { chunkSize, overlap } = config;

  if (text.length <= chunkSize) {
    return [text.trim()];
  }

  const halfWindow = Math.floor(chunkSize / 2);
  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + chunkSize;
    let chunk = text.slice(start, end);

    if (end < text.length) {
      const lastSpace = chunk.lastIndexOf(' ');
      if (lastSpace > halfWindow) {
        chunk = chunk.slice(0, lastSpace);
        end = start + lastSpace;
      }
    }

    chunks.push(chunk.trim());
    start = end - overlap;
  }

  return chunks;
}
