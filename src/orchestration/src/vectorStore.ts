/**
 * Vector store module
 * Defines the store contract the core relies on and an in-memory
 * implementation of it.
 * The in-memory store embeds text with a character-frequency vector; it is
 * meant for offline runs and tests. Use ChromaChunkStore for the real corpus.
 */

import { ChunkMetadata, StoreQueryResult } from './types';
import { ChunkIdCollisionError } from './errors';
import { logger } from './logger';

export interface ChunkStore {
  /**
   * Bulk add. Re-adding an id replaces that entry; an id owned by another
   * source raises ChunkIdCollisionError.
   */
  add(ids: string[], texts: string[], metadatas: ChunkMetadata[]): Promise<void>;

  /**
   * Ranked most-to-least similar; both arrays are rank-aligned.
   */
  query(text: string, k: number): Promise<StoreQueryResult>;

  /**
   * Source currently stored under each of ids; ids not in the store are absent
   */
  storedSources(ids: string[]): Promise<Map<string, string>>;

  count(): Promise<number>;

  deleteBySource(source: string): Promise<void>;
}

/**
 * Throw ChunkIdCollisionError for the first id stored under another source
 */
export function assertNoForeignIds(
  stored: Map<string, string>,
  ids: string[],
  metadatas: ChunkMetadata[]
): void {
  ids.forEach((id, i) => {
    const storedSource = stored.get(id);
    if (storedSource !== undefined && storedSource !== metadatas[i].source) {
      throw new ChunkIdCollisionError(id, storedSource, metadatas[i].source);
    }
  });
}

export function assertAlignedBatch(ids: string[], texts: string[], metadatas: ChunkMetadata[]): void {
  if (ids.length !== texts.length || ids.length !== metadatas.length) {
    throw new Error(
      `ids, texts and metadatas must have the same length (got ${ids.length}, ${texts.length}, ${metadatas.length})`
    );
  }
}

const EMBEDDING_DIMENSIONS = 300;

/**
 * Simple cosine similarity calculation
 */
export function cosineSimilarity(vec1: number[], vec2: number[]): number {
  if (vec1.length !== vec2.length) {
    throw new Error('Vectors must have same length');
  }

  let dotProduct = 0;
  let norm1 = 0;
  let norm2 = 0;

  for (let i = 0; i < vec1.length; i++) {
    dotProduct += vec1[i] * vec2[i];
    norm1 += vec1[i] * vec1[i];
    norm2 += vec2[i] * vec2[i];
  }

  if (norm1 === 0 || norm2 === 0) {
    return 0;
  }

  return dotProduct / (Math.sqrt(norm1) * Math.sqrt(norm2));
}

/**
 * Character-frequency embedding, unit length unless the text is empty
 */
export function generateSimpleEmbedding(text: string): number[] {
  const normalized = text.toLowerCase();
  const embedding = new Array<number>(EMBEDDING_DIMENSIONS).fill(0);

  for (let i = 0; i < normalized.length; i++) {
    embedding[normalized.charCodeAt(i) % EMBEDDING_DIMENSIONS] += 1;
  }

  const magnitude = Math.sqrt(embedding.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) {
    return embedding;
  }
  return embedding.map(val => val / magnitude);
}

interface StoredChunk {
  text: string;
  metadata: ChunkMetadata;
  embedding: number[];
}

/**
 * In-memory vector store; insertion order is kept so ties rank stably
 */
export class InMemoryChunkStore implements ChunkStore {
  private entries = new Map<string, StoredChunk>();

  async add(ids: string[], texts: string[], metadatas: ChunkMetadata[]): Promise<void> {
    assertAlignedBatch(ids, texts, metadatas);
    logger.info(`Adding ${ids.length} chunks to in-memory store`);

    // Check the whole batch first so a collision leaves the store unchanged
    assertNoForeignIds(await this.storedSources(ids), ids, metadatas);

    ids.forEach((id, i) => {
      this.entries.set(id, {
        text: texts[i],
        metadata: { ...metadatas[i] },
        embedding: generateSimpleEmbedding(texts[i])
      });
    });

    logger.debug(`In-memory store now holds ${this.entries.size} chunks`);
  }

  async query(text: string, k: number): Promise<StoreQueryResult> {
    const queryEmbedding = generateSimpleEmbedding(text);

    const scored = Array.from(this.entries.values()).map(entry => ({
      entry,
      score: cosineSimilarity(queryEmbedding, entry.embedding)
    }));

    // Array.prototype.sort is stable, so equal scores keep insertion order
    scored.sort((a, b) => b.score - a.score);
    const top = scored.slice(0, k);

    logger.debug(`In-memory query returned ${top.length} results`);
    return {
      documents: top.map(({ entry }) => entry.text),
      metadatas: top.map(({ entry }) => ({ ...entry.metadata }))
    };
  }

  async storedSources(ids: string[]): Promise<Map<string, string>> {
    const sources = new Map<string, string>();
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) {
        sources.set(id, entry.metadata.source);
      }
    }
    return sources;
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async deleteBySource(source: string): Promise<void> {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (entry.metadata.source === source) {
        this.entries.delete(id);
        removed++;
      }
    }
    logger.debug(`Removed ${removed} chunks for source ${source}`);
  }
}
