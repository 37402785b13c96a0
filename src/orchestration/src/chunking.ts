/**
 * Fixed-window chunking module
 * Splits extracted document text into overlapping character windows:
 * - windows of `chunkSize` characters, each starting `chunkSize - overlap`
 *   characters after the previous one
 * - whitespace-only windows are dropped
 * - the final window may be shorter than `chunkSize`
 */

import { ChunkingConfig, TextWindow } from './types';
import { InvalidConfigurationError } from './errors';
import { logger } from './logger';

/**
 * Throws when the window would never advance or the sizes are not whole
 * numbers.
 */
export function validateChunkingConfig(config: ChunkingConfig): void {
  const { chunkSize, overlap } = config;

  if (!Number.isInteger(chunkSize) || !Number.isInteger(overlap)) {
    throw new InvalidConfigurationError(
      `chunkSize and overlap must be integers (got chunkSize=${chunkSize}, overlap=${overlap})`
    );
  }
  if (overlap < 0) {
    throw new InvalidConfigurationError(`overlap must be >= 0 (got ${overlap})`);
  }
  if (chunkSize <= overlap) {
    throw new InvalidConfigurationError(
      `chunkSize must be greater than overlap (got chunkSize=${chunkSize}, overlap=${overlap})`
    );
  }
}

/**
 * Split text into windows, keeping their offsets into the original text
 */
export function splitIntoWindows(
  text: string,
  chunkSize: number,
  overlap: number
): TextWindow[] {
  validateChunkingConfig({ chunkSize, overlap });

  const windows: TextWindow[] = [];
  const step = chunkSize - overlap;

  for (let start = 0; start < text.length; start += step) {
    const end = Math.min(start + chunkSize, text.length);
    const slice = text.slice(start, end);

    if (slice.trim().length > 0) {
      windows.push({ start, end, text: slice });
    }
  }

  return windows;
}

/**
 * Character-based chunking with overlap
 */
export function chunkText(text: string, chunkSize: number, overlap: number): string[] {
  logger.debug(`Chunking text (length=${text.length}) with chunkSize=${chunkSize}, overlap=${overlap}`);

  const chunks = splitIntoWindows(text, chunkSize, overlap).map(w => w.text);

  logger.debug(`Created ${chunks.length} chunks from provided text`);
  return chunks;
}
