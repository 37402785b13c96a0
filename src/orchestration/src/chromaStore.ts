/**
 * Chroma-backed chunk store
 * Persists chunks in a Chroma collection; embeddings are computed by a local
 * Ollama server when Chroma calls the embedding function.
 */

import axios from 'axios';
import { ChromaClient, Collection, IEmbeddingFunction, IncludeEnum } from 'chromadb';
import { ChromaDBConfig, ChunkMetadata, OllamaConfig, StoreQueryResult } from './types';
import { ChunkStore, assertAlignedBatch, assertNoForeignIds } from './vectorStore';
import { logger } from './logger';

interface OllamaEmbedResponse {
  embeddings: number[][];
}

/**
 * Embedding function calling Ollama's batch embed endpoint
 */
export class OllamaEmbedder implements IEmbeddingFunction {
  constructor(private readonly config: OllamaConfig) {}

  async generate(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    logger.debug(`Embedding ${texts.length} texts with ${this.config.embedModel}`);

    const response = await axios.post<OllamaEmbedResponse>(
      `${this.config.url}/api/embed`,
      { model: this.config.embedModel, input: texts }
    );

    const { embeddings } = response.data;
    if (!Array.isArray(embeddings) || embeddings.length !== texts.length) {
      throw new Error(
        `Ollama returned ${Array.isArray(embeddings) ? embeddings.length : 'no'} embeddings for ${texts.length} texts`
      );
    }
    return embeddings;
  }
}

export class ChromaChunkStore implements ChunkStore {
  private collectionPromise: Promise<Collection> | null = null;

  constructor(
    private readonly client: ChromaClient,
    private readonly config: ChromaDBConfig,
    private readonly embeddingFunction: IEmbeddingFunction
  ) {}

  static fromConfig(chroma: ChromaDBConfig, ollama: OllamaConfig): ChromaChunkStore {
    return new ChromaChunkStore(
      new ChromaClient({ path: chroma.url }),
      chroma,
      new OllamaEmbedder(ollama)
    );
  }

  /**
   * Connect lazily; the collection is reused for the lifetime of the store
   */
  private collection(): Promise<Collection> {
    if (!this.collectionPromise) {
      logger.info(`Connecting to Chroma at ${this.config.url} for collection '${this.config.collectionName}'`);
      this.collectionPromise = this.client
        .getOrCreateCollection({
          name: this.config.collectionName,
          embeddingFunction: this.embeddingFunction
        })
        .catch((error: unknown) => {
          this.collectionPromise = null;
          throw error;
        });
    }
    return this.collectionPromise;
  }

  async add(ids: string[], texts: string[], metadatas: ChunkMetadata[]): Promise<void> {
    assertAlignedBatch(ids, texts, metadatas);
    if (ids.length === 0) {
      return;
    }

    assertNoForeignIds(await this.storedSources(ids), ids, metadatas);
    const collection = await this.collection();

    logger.info(`Adding ${ids.length} chunks to Chroma (this calls Ollama for embeddings)...`);
    await collection.upsert({
      ids,
      documents: texts,
      metadatas: metadatas.map(m => ({ source: m.source, chunk_index: m.chunk_index }))
    });
  }

  async storedSources(ids: string[]): Promise<Map<string, string>> {
    const sources = new Map<string, string>();
    if (ids.length === 0) {
      return sources;
    }

    const collection = await this.collection();
    const existing = await collection.get({ ids, include: [IncludeEnum.Metadatas] });
    existing.ids.forEach((id, i) => {
      const stored = existing.metadatas[i];
      if (stored && typeof stored.source === 'string') {
        sources.set(id, stored.source);
      }
    });
    return sources;
  }

  async query(text: string, k: number): Promise<StoreQueryResult> {
    const collection = await this.collection();
    const result = await collection.query({ queryTexts: [text], nResults: k });

    const documents = result.documents[0] ?? [];
    const metadatas = result.metadatas[0] ?? [];

    return {
      documents: documents.map(doc => doc ?? ''),
      metadatas: metadatas.map(meta => ({ ...(meta ?? {}) }))
    };
  }

  async count(): Promise<number> {
    const collection = await this.collection();
    return collection.count();
  }

  async deleteBySource(source: string): Promise<void> {
    const collection = await this.collection();
    await collection.delete({ where: { source } });
  }
}
