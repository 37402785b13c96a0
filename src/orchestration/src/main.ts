#!/usr/bin/env node
/**
 * Main entry point for the clinical guidelines RAG CLI
 */

import * as path from 'path';
import * as readline from 'readline/promises';
import { loadConfig } from './config';
import { createExtractor, createRagPipeline, listPdfFiles, RagPipeline } from './ragPipeline';
import { ChatSession } from './chatSession';
import { CliArgs, parseCliArgs, USAGE } from './cliArgs';
import { formatProvenanceHeader } from './contextBuilder';
import { chunkText } from './chunking';
import { logger } from './logger';
import { RagConfig } from './types';

const PREVIEW_LENGTH = 600;
const QUIT_WORDS = new Set(['q', 'quit', 'exit']);

function preview(text: string): string {
  return text.slice(0, PREVIEW_LENGTH).replace(/\n/g, '\\n\n');
}

async function runIngest(pipeline: RagPipeline, args: CliArgs): Promise<void> {
  const report = await pipeline.ingestDirectory(args.pdfDir);

  logger.separator('=');
  console.log(`Status: ${report.status}`);
  console.log(`Documents processed: ${report.documentsProcessed}`);
  console.log(`Chunks added: ${report.chunksAdded}`);
  if (report.skippedEmptyDocuments.length > 0) {
    console.log(`Skipped (no text): ${report.skippedEmptyDocuments.join(', ')}`);
  }
  logger.separator('=');
}

async function runAsk(pipeline: RagPipeline, args: CliArgs, question: string): Promise<void> {
  const result = await pipeline.answerWithSources(question, args.model, args.topK);

  logger.separator('=');
  console.log('\nQuestion:', result.question);
  console.log('\nAnswer:');
  console.log(result.answer);

  if (args.showSources) {
    console.log('\nSources:');
    result.sourceChunks.forEach((chunk, i) => {
      console.log(`  [${i + 1}] ${formatProvenanceHeader(chunk)}`);
    });
  }
  logger.separator('=');
}

async function runRetrieve(pipeline: RagPipeline, args: CliArgs, question: string): Promise<void> {
  const chunks = await pipeline.retrieve(question, args.topK);

  console.log(`Question: ${question}`);
  chunks.forEach((chunk, i) => {
    logger.separator('=');
    console.log(`Rank #${i + 1}`);
    console.log(`Source      : ${chunk.source}`);
    console.log(`Chunk index : ${chunk.chunkIndex}`);
    logger.separator('-');
    console.log(preview(chunk.text));
    console.log('[...]');
  });
}

async function runInspect(config: RagConfig, args: CliArgs): Promise<void> {
  const chunkSize = args.chunkSize ?? config.chunking.chunkSize;
  const overlap = args.overlap ?? config.chunking.overlap;
  const extractor = createExtractor(config);
  const pdfFiles = listPdfFiles(args.pdfDir ?? config.pdfDir);

  if (pdfFiles.length === 0) {
    logger.warn('No PDFs to inspect');
    return;
  }

  for (const pdfFile of pdfFiles) {
    const text = await extractor.extract(pdfFile);
    const chunks = chunkText(text, chunkSize, overlap);

    logger.separator('=');
    console.log(`File: ${path.basename(pdfFile)}`);
    console.log(`Config: chunkSize=${chunkSize}, overlap=${overlap}`);
    console.log(`Characters extracted: ${text.length}`);
    console.log(`Number of chunks: ${chunks.length}`);

    chunks.slice(0, 2).forEach((chunk, i) => {
      logger.separator('-', 40);
      console.log(`Chunk ${i} (len=${chunk.length}):`);
      console.log(preview(chunk));
      console.log('[...]');
    });
  }
}

async function runChat(pipeline: RagPipeline, args: CliArgs): Promise<void> {
  const session = new ChatSession(pipeline, { model: args.model, topK: args.topK });
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  console.log('Ask something about estimands, GCP or oncology endpoints.');
  console.log("Tip: start with 'What is an estimand according to ICH E9(R1)?'");
  console.log("Type 'q' to quit.");

  try {
    for (;;) {
      const question = (await rl.question('\nQ: ')).trim();
      if (!question || QUIT_WORDS.has(question.toLowerCase())) {
        break;
      }

      console.log('\nReasoning over guidelines...');
      const answer = await session.ask(question);
      console.log('\nA:', answer);
      console.log('-'.repeat(60));
    }
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    console.log(USAGE);
    process.exitCode = 1;
    return;
  }

  if (args.command === 'help') {
    console.log(USAGE);
    return;
  }

  try {
    const config = loadConfig();
    const pipeline = createRagPipeline(config);

    switch (args.command) {
      case 'ingest':
        await runIngest(pipeline, args);
        break;
      case 'ask':
        await runAsk(pipeline, args, args.question ?? '');
        break;
      case 'retrieve':
        await runRetrieve(pipeline, args, args.question ?? '');
        break;
      case 'inspect':
        await runInspect(config, args);
        break;
      case 'chat':
        await runChat(pipeline, args);
        break;
    }
  } catch (error) {
    logger.error(`${args.command} failed`, error);
    process.exitCode = 1;
  } finally {
    logger.close();
  }
}

main().catch(error => {
  console.error(error);
  process.exit(1);
});
