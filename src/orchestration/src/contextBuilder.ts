import { RetrievedChunk } from './types';
import { logger } from './logger';

export function formatProvenanceHeader(chunk: RetrievedChunk): string {
  return `[Source: ${chunk.source} | chunk ${chunk.chunkIndex}]`;
}

/**
 * Format retrieved chunks into one context string, in the order received.
 * An empty input gives an empty string.
 */
export function buildContextBlock(chunks: RetrievedChunk[]): string {
  logger.debug(`Building context block for ${chunks.length} chunks`);

  const blocks = chunks.map(chunk => `${formatProvenanceHeader(chunk)}\n${chunk.text}`);
  const context = blocks.join('\n\n');

  logger.debug(`Context block assembled with ${context.length} characters`);
  return context;
}
