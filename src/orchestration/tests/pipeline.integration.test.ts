/**
 * Integration tests for the complete RAG pipeline
 */

import * as fs from 'fs';
import * as path from 'path';
import { createRagPipeline, listPdfFiles } from '../src/ragPipeline';
import { loadConfig } from '../src/config';
import { NO_CONTEXT_ANSWER } from '../src/answerGenerator';
import { ChatMessage } from '../src/types';
import { createChatDouble, createExtractorDouble, makeTempDir } from './test-helpers';

describe('Pipeline Integration Tests', () => {
  const config = loadConfig({ RAG_STORE: 'memory', RAG_CHUNK_SIZE: '60', RAG_CHUNK_OVERLAP: '10' });
  const texts = {
    'ich_e9.pdf': 'An estimand has four attributes.',
    'ich_e6.pdf': 'Sponsors keep essential records.',
    'blank.pdf': '   \n  '
  };

  let pdfDir: string;

  beforeAll(() => {
    pdfDir = makeTempDir();
    for (const name of ['ich_e9.pdf', 'ich_e6.pdf', 'blank.pdf', 'notes.txt']) {
      fs.writeFileSync(path.join(pdfDir, name), 'placeholder');
    }
  });

  afterAll(() => {
    fs.rmSync(pdfDir, { recursive: true, force: true });
  });

  describe('Full pipeline execution', () => {
    it('should ingest a directory and answer from the stored chunks', async () => {
      const extractor = createExtractorDouble(texts);
      const chat = createChatDouble('Four attributes define an estimand.');
      const pipeline = createRagPipeline(config, { extractor, chatClient: chat });

      const report = await pipeline.ingestDirectory(pdfDir);

      expect(report).toEqual({
        status: 'added',
        chunksAdded: 2,
        documentsProcessed: 3,
        skippedEmptyDocuments: ['blank.pdf']
      });
      expect(await pipeline.count()).toBe(2);

      const answer = await pipeline.answerQuestion('What is an estimand?');

      expect(answer).toBe('Four attributes define an estimand.');
      expect(chat.chat).toHaveBeenCalledTimes(1);
      const [model, messages] = chat.chat.mock.calls[0];
      const userPrompt = messages.find((message: ChatMessage) => message.role === 'user')?.content ?? '';
      expect(model).toBe('deepseek-r1');
      expect(userPrompt).toContain('[Source: ich_e9.pdf | chunk 0]\nAn estimand has four attributes.');
      expect(userPrompt).toContain('[Source: ich_e6.pdf | chunk 0]\nSponsors keep essential records.');
    });

    it('should answer with the fallback when nothing is stored', async () => {
      const chat = createChatDouble();
      const pipeline = createRagPipeline(config, { extractor: createExtractorDouble({}), chatClient: chat });

      expect(await pipeline.answerQuestion('What is an estimand?')).toBe(NO_CONTEXT_ANSWER);
      expect(chat.chat).not.toHaveBeenCalled();
    });

    it('should replace a document on re-ingestion', async () => {
      const extractor = createExtractorDouble(texts);
      const pipeline = createRagPipeline(config, { extractor, chatClient: createChatDouble() });

      await pipeline.ingestDirectory(pdfDir);
      await pipeline.ingestDirectory(pdfDir);

      expect(await pipeline.count()).toBe(2);
    });

    it('should retrieve with an explicit top-k', async () => {
      const pipeline = createRagPipeline(config, {
        extractor: createExtractorDouble(texts),
        chatClient: createChatDouble()
      });
      await pipeline.ingestDirectory(pdfDir);

      const chunks = await pipeline.retrieve('estimand', 1);

      expect(chunks).toHaveLength(1);
    });
  });

  describe('Directory handling', () => {
    it('should list only PDFs, sorted by name', () => {
      expect(listPdfFiles(pdfDir).map(file => path.basename(file))).toEqual([
        'blank.pdf',
        'ich_e6.pdf',
        'ich_e9.pdf'
      ]);
    });

    it('should reject a missing directory', async () => {
      const pipeline = createRagPipeline(config, { extractor: createExtractorDouble({}) });
      const missing = path.join(pdfDir, 'missing');

      await expect(pipeline.ingestDirectory(missing)).rejects.toThrow(`PDF directory not found: ${missing}`);
    });

    it('should report an empty batch for a directory without PDFs', async () => {
      const emptyDir = makeTempDir();
      const extractor = createExtractorDouble({});
      const pipeline = createRagPipeline(config, { extractor });

      try {
        expect(await pipeline.ingestDirectory(emptyDir)).toEqual({
          status: 'empty-batch',
          chunksAdded: 0,
          documentsProcessed: 0,
          skippedEmptyDocuments: []
        });
        expect(extractor.extract).not.toHaveBeenCalled();
      } finally {
        fs.rmSync(emptyDir, { recursive: true, force: true });
      }
    });
  });
});
