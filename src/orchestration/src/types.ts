/**
 * Type definitions for the clinical guidelines RAG system
 */

export interface SourceDocument {
  /** File base name, e.g. `ich_e9.pdf` */
  name: string;
  text: string;
}

/**
 * Metadata stored beside each chunk. Keys are snake_case to match the
 * persisted collection layout.
 */
export interface ChunkMetadata {
  source: string;
  chunk_index: number;
}

export interface Chunk {
  id: string;
  text: string;
  source: string;
  chunkIndex: number;
}

export interface TextWindow {
  start: number;
  end: number;
  text: string;
}

export interface RetrievedChunk {
  text: string;
  source: string;
  chunkIndex: number;
}

export interface StoreQueryResult {
  documents: string[];
  metadatas: Array<Record<string, unknown>>;
}

export interface IngestReport {
  status: 'added' | 'empty-batch';
  chunksAdded: number;
  documentsProcessed: number;
  skippedEmptyDocuments: string[];
}

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface AnswerResult {
  question: string;
  answer: string;
  sourceChunks: RetrievedChunk[];
}

export interface ChunkingConfig {
  chunkSize: number;
  overlap: number;
}

export interface GroqConfig {
  apiKey: string;
}

export interface OllamaConfig {
  url: string;
  embedModel: string;
}

export interface ChromaDBConfig {
  url: string;
  collectionName: string;
}

export type LlmProvider = 'ollama' | 'groq';
export type ExtractorKind = 'pdfjs' | 'docling';
export type StoreKind = 'chroma' | 'memory';

export interface RagConfig {
  pdfDir: string;
  store: StoreKind;
  chroma: ChromaDBConfig;
  ollama: OllamaConfig;
  llmProvider: LlmProvider;
  llmModel: string;
  groq?: GroqConfig;
  chunking: ChunkingConfig;
  topK: number;
  extractor: ExtractorKind;
  doclingApiUrl: string;
}
