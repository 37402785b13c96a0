/**
 * Configuration loading
 * All settings come from environment variables; unset or empty variables
 * take the defaults below. Invalid values fail here, before any document
 * is touched.
 */

import { z } from 'zod';
import { RagConfig } from './types';
import { InvalidConfigurationError } from './errors';
import { validateChunkingConfig } from './chunking';

export const DEFAULT_OLLAMA_MODEL = 'deepseek-r1';
export const DEFAULT_GROQ_MODEL = 'llama-3.3-70b-versatile';

const envSchema = z.object({
  RAG_PDF_DIR: z.string().default('./data/pdfs'),
  RAG_STORE: z.enum(['chroma', 'memory']).default('chroma'),
  CHROMA_URL: z.string().url().default('http://localhost:8000'),
  RAG_COLLECTION: z.string().default('clinical_guidelines'),
  OLLAMA_URL: z.string().url().default('http://localhost:11434'),
  RAG_EMBED_MODEL: z.string().default('nomic-embed-text'),
  RAG_LLM_PROVIDER: z.enum(['ollama', 'groq']).default('ollama'),
  RAG_LLM_MODEL: z.string().optional(),
  GROQ_API_KEY: z.string().optional(),
  RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(1200),
  RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
  RAG_TOP_K: z.coerce.number().int().min(1).default(5),
  RAG_EXTRACTOR: z.enum(['pdfjs', 'docling']).default('pdfjs'),
  DOCLING_API_URL: z.string().url().default('http://localhost:5001')
});

function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RagConfig {
  const parsed = envSchema.safeParse(dropEmpty(env));

  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigurationError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  const chunking = { chunkSize: vars.RAG_CHUNK_SIZE, overlap: vars.RAG_CHUNK_OVERLAP };
  validateChunkingConfig(chunking);

  if (vars.RAG_LLM_PROVIDER === 'groq' && !vars.GROQ_API_KEY) {
    throw new InvalidConfigurationError('GROQ_API_KEY is required when RAG_LLM_PROVIDER=groq');
  }

  const defaultModel = vars.RAG_LLM_PROVIDER === 'groq' ? DEFAULT_GROQ_MODEL : DEFAULT_OLLAMA_MODEL;

  return {
    pdfDir: vars.RAG_PDF_DIR,
    store: vars.RAG_STORE,
    chroma: {
      url: vars.CHROMA_URL,
      collectionName: vars.RAG_COLLECTION
    },
    ollama: {
      url: vars.OLLAMA_URL,
      embedModel: vars.RAG_EMBED_MODEL
    },
    llmProvider: vars.RAG_LLM_PROVIDER,
    llmModel: vars.RAG_LLM_MODEL ?? defaultModel,
    groq: vars.GROQ_API_KEY ? { apiKey: vars.GROQ_API_KEY } : undefined,
    chunking,
    topK: vars.RAG_TOP_K,
    extractor: vars.RAG_EXTRACTOR,
    doclingApiUrl: vars.DOCLING_API_URL
  };
}
