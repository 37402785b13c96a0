/**
 * Retrieval module
 * Runs the similarity query against the chunk store and validates the
 * shape of what comes back. No caching: every call re-queries the store.
 */

import { RetrievedChunk } from './types';
import { ChunkStore } from './vectorStore';
import { InvalidConfigurationError, StoreResponseShapeError } from './errors';
import { logger } from './logger';

export function validateTopK(k: number): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidConfigurationError(`top-k must be an integer >= 1 (got ${k})`);
  }
}

function toRetrievedChunk(text: string, metadata: Record<string, unknown>, rank: number): RetrievedChunk {
  const { source, chunk_index: chunkIndex } = metadata;

  if (typeof source !== 'string' || typeof chunkIndex !== 'number' || !Number.isInteger(chunkIndex)) {
    throw new StoreResponseShapeError(
      `Result at rank ${rank + 1} lacks source/chunk_index metadata: ${JSON.stringify(metadata)}`
    );
  }

  return { text, source, chunkIndex };
}

export class Retriever {
  constructor(private readonly store: ChunkStore) {}

  /**
   * Ranked most-to-least relevant; an empty array means no relevant context
   */
  async retrieve(query: string, k: number): Promise<RetrievedChunk[]> {
    validateTopK(k);
    logger.info(`Running retrieval for query="${query}" with topK=${k}`);

    const { documents, metadatas } = await this.store.query(query, k);

    if (documents.length !== metadatas.length) {
      throw new StoreResponseShapeError(
        `Store returned ${documents.length} documents but ${metadatas.length} metadatas`
      );
    }

    const chunks = documents.map((text, rank) => toRetrievedChunk(text, metadatas[rank], rank));
    logger.info(`Retrieved ${chunks.length} chunks`);
    return chunks;
  }
}
