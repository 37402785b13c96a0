/**
 * Ingestion module
 * Extracts text from source documents, chunks it, attaches provenance
 * metadata and hands the whole batch to the chunk store in one add call.
 *
 * A batch is not transactional across documents: if the store fails
 * mid-batch, re-run the ingestion. Chunk ids are deterministic, so re-adding
 * replaces rather than duplicates.
 */

import * as path from 'path';
import { Chunk, ChunkingConfig, IngestReport, SourceDocument } from './types';
import { ChunkStore, assertNoForeignIds } from './vectorStore';
import { TextExtractor } from './textExtraction';
import { chunkText, validateChunkingConfig } from './chunking';
import { ChunkIdCollisionError } from './errors';
import { logger } from './logger';

export interface IngestOptions {
  /** Delete each document's stored chunks before adding the new ones */
  replaceExisting?: boolean;
}

export function documentStem(name: string): string {
  return path.parse(name).name;
}

/**
 * Build the chunks of one document; chunkIndex counts emitted chunks only
 */
export function buildDocumentChunks(document: SourceDocument, config: ChunkingConfig): Chunk[] {
  const stem = documentStem(document.name);

  return chunkText(document.text, config.chunkSize, config.overlap).map((text, chunkIndex) => ({
    id: `${stem}_${chunkIndex}`,
    text,
    source: document.name,
    chunkIndex
  }));
}

export class Ingestor {
  private readonly replaceExisting: boolean;

  constructor(
    private readonly store: ChunkStore,
    private readonly extractor: TextExtractor,
    private readonly chunking: ChunkingConfig,
    options: IngestOptions = {}
  ) {
    validateChunkingConfig(chunking);
    this.replaceExisting = options.replaceExisting ?? true;
  }

  /**
   * Extract each file, then ingest the resulting documents
   */
  async ingestFiles(filePaths: string[]): Promise<IngestReport> {
    const documents: SourceDocument[] = [];

    for (const filePath of filePaths) {
      const name = path.basename(filePath);
      logger.info(`Processing: ${name}`);
      documents.push({ name, text: await this.extractor.extract(filePath) });
    }

    return this.ingestDocuments(documents);
  }

  async ingestDocuments(documents: SourceDocument[]): Promise<IngestReport> {
    logger.section('Ingesting Documents');
    logger.info(`Documents: ${documents.length}, chunkSize=${this.chunking.chunkSize}, overlap=${this.chunking.overlap}`);

    const chunks: Chunk[] = [];
    const skippedEmptyDocuments: string[] = [];
    const ingestedSources: string[] = [];

    for (const document of documents) {
      const documentChunks = buildDocumentChunks(document, this.chunking);

      if (documentChunks.length === 0) {
        logger.warn(`No chunks produced for ${document.name}; skipping`);
        skippedEmptyDocuments.push(document.name);
        continue;
      }

      logger.info(`Created ${documentChunks.length} chunks from ${document.name}`);
      chunks.push(...documentChunks);
      ingestedSources.push(document.name);
    }

    if (chunks.length === 0) {
      logger.warn('No chunks to add; leaving the store unchanged');
      return {
        status: 'empty-batch',
        chunksAdded: 0,
        documentsProcessed: documents.length,
        skippedEmptyDocuments
      };
    }

    // Only documents that produced chunks can write ids
    this.assertDistinctStems(ingestedSources);

    const ids = chunks.map(c => c.id);
    const metadatas = chunks.map(c => ({ source: c.source, chunk_index: c.chunkIndex }));

    try {
      // A colliding batch must leave the store unchanged, so check before deleting
      assertNoForeignIds(await this.store.storedSources(ids), ids, metadatas);

      if (this.replaceExisting) {
        for (const source of ingestedSources) {
          await this.store.deleteBySource(source);
        }
      }

      await this.store.add(ids, chunks.map(c => c.text), metadatas);
    } catch (error) {
      logger.error('Store rejected the ingestion batch', error);
      throw error;
    }

    logger.success(`Ingestion complete: ${chunks.length} chunks from ${ingestedSources.length} documents`);
    return {
      status: 'added',
      chunksAdded: chunks.length,
      documentsProcessed: documents.length,
      skippedEmptyDocuments
    };
  }

  /**
   * Documents sharing a stem would write the same chunk ids
   */
  private assertDistinctStems(names: string[]): void {
    const seen = new Map<string, string>();

    for (const name of names) {
      const stem = documentStem(name);
      const previous = seen.get(stem);
      if (previous !== undefined) {
        throw new ChunkIdCollisionError(`${stem}_0`, previous, name);
      }
      seen.set(stem, name);
    }
  }
}
