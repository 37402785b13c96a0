/**
 * RAG pipeline
 * Wires configuration to the store, extractor and chat model, and exposes
 * the two flows:
 * 1. Ingestion: PDF directory -> text -> chunks -> store (batch, offline)
 * 2. Question answering: question -> retrieval -> context -> answer
 */

import * as fs from 'fs';
import * as path from 'path';
import { AnswerGenerator } from './answerGenerator';
import { ChatClient, GroqChatClient, OllamaChatClient } from './chatClient';
import { ChromaChunkStore } from './chromaStore';
import { Ingestor } from './ingestion';
import { Retriever, validateTopK } from './retriever';
import { DoclingTextExtractor, PdfTextExtractor, TextExtractor } from './textExtraction';
import { ChunkStore, InMemoryChunkStore } from './vectorStore';
import { InvalidConfigurationError } from './errors';
import { logger } from './logger';
import { AnswerResult, IngestReport, RagConfig, RetrievedChunk } from './types';

export interface RagCollaborators {
  store: ChunkStore;
  chatClient: ChatClient;
  extractor: TextExtractor;
}

export interface RagPipeline {
  /** Caller-facing entry point: the answer text, or the no-context fallback */
  answerQuestion(question: string, model?: string, topK?: number): Promise<string>;
  answerWithSources(question: string, model?: string, topK?: number): Promise<AnswerResult>;
  retrieve(question: string, topK?: number): Promise<RetrievedChunk[]>;
  ingestFiles(filePaths: string[]): Promise<IngestReport>;
  ingestDirectory(pdfDir?: string): Promise<IngestReport>;
  count(): Promise<number>;
}

export function createStore(config: RagConfig): ChunkStore {
  if (config.store === 'memory') {
    return new InMemoryChunkStore();
  }
  return ChromaChunkStore.fromConfig(config.chroma, config.ollama);
}

export function createChatClient(config: RagConfig): ChatClient {
  if (config.llmProvider === 'groq') {
    if (!config.groq) {
      throw new InvalidConfigurationError('Groq provider selected without an API key');
    }
    return new GroqChatClient(config.groq, { temperature: 0.2, maxTokens: 1000 });
  }
  return new OllamaChatClient(config.ollama.url, { temperature: 0.2 });
}

export function createExtractor(config: RagConfig): TextExtractor {
  return config.extractor === 'docling'
    ? new DoclingTextExtractor(config.doclingApiUrl)
    : new PdfTextExtractor();
}

/**
 * List the PDFs of a directory, sorted by name for a stable ingestion order
 */
export function listPdfFiles(pdfDir: string): string[] {
  if (!fs.existsSync(pdfDir)) {
    throw new Error(`PDF directory not found: ${pdfDir}`);
  }

  return fs
    .readdirSync(pdfDir)
    .filter(name => name.toLowerCase().endsWith('.pdf'))
    .sort()
    .map(name => path.join(pdfDir, name));
}

export function createRagPipeline(
  config: RagConfig,
  overrides: Partial<RagCollaborators> = {}
): RagPipeline {
  validateTopK(config.topK);

  const store = overrides.store ?? createStore(config);
  const extractor = overrides.extractor ?? createExtractor(config);
  const retriever = new Retriever(store);
  const ingestor = new Ingestor(store, extractor, config.chunking);

  // Created on first question so ingestion never needs LLM credentials
  let chatClient: ChatClient | undefined = overrides.chatClient;
  const generator = (): AnswerGenerator => {
    chatClient = chatClient ?? createChatClient(config);
    return new AnswerGenerator(retriever, chatClient);
  };

  const ingestFiles = async (filePaths: string[]): Promise<IngestReport> => {
    const startTime = Date.now();
    const report = await ingestor.ingestFiles(filePaths);
    const duration = ((Date.now() - startTime) / 1000).toFixed(2);

    logger.info(`Ingestion took ${duration}s`);
    if (report.status === 'added') {
      logger.info(`Store now holds ${await store.count()} chunks`);
    }
    return report;
  };

  return {
    answerQuestion: async (question, model = config.llmModel, topK = config.topK) =>
      generator().answer(question, model, topK),

    answerWithSources: async (question, model = config.llmModel, topK = config.topK) =>
      generator().answerWithSources(question, model, topK),

    retrieve: async (question, topK = config.topK) => retriever.retrieve(question, topK),

    ingestFiles,

    ingestDirectory: async (pdfDir = config.pdfDir) => {
      const pdfFiles = listPdfFiles(pdfDir);

      if (pdfFiles.length === 0) {
        logger.warn(`No PDFs found in ${pdfDir}`);
        return { status: 'empty-batch', chunksAdded: 0, documentsProcessed: 0, skippedEmptyDocuments: [] };
      }

      logger.info(`Found ${pdfFiles.length} PDF(s): ${pdfFiles.map(f => path.basename(f)).join(', ')}`);
      return ingestFiles(pdfFiles);
    },

    count: async () => store.count()
  };
}
