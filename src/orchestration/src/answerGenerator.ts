/**
 * Answer generation module
 * Retrieve -> assemble context -> prompt -> call the chat model -> normalize.
 * The chat model is never called without retrieved context.
 */

import { AnswerResult, ChatMessage } from './types';
import { Retriever } from './retriever';
import { buildContextBlock } from './contextBuilder';
import { ChatClient, extractAnswerText } from './chatClient';
import { logger } from './logger';

export const NO_CONTEXT_ANSWER = "I couldn't retrieve any relevant context for this question.";

export const SYSTEM_PROMPT =
  'You are a clinical-trials assistant. ' +
  "Answer the user's question using ONLY the context given. " +
  'If the answer is not in the context, say explicitly: ' +
  "'The answer is not available in the provided guidelines.' " +
  'Cite guideline names or sections when possible, but do not invent facts.';

export function buildUserPrompt(context: string, question: string): string {
  return `Context from clinical guidelines:\n\n${context}\n\n` +
    `Question: ${question}\n\n` +
    'Answer concisely in a few paragraphs.';
}

export function buildMessages(context: string, question: string): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content: buildUserPrompt(context, question) }
  ];
}

export class AnswerGenerator {
  constructor(
    private readonly retriever: Retriever,
    private readonly chatClient: ChatClient
  ) {}

  async answer(question: string, model: string, topK: number): Promise<string> {
    const result = await this.answerWithSources(question, model, topK);
    return result.answer;
  }

  /**
   * Same as answer(), also returning the chunks the answer was grounded on
   */
  async answerWithSources(question: string, model: string, topK: number): Promise<AnswerResult> {
    logger.section('Answering Question');
    logger.info(`Question: "${question}"`);

    const sourceChunks = await this.retriever.retrieve(question, topK);

    if (sourceChunks.length === 0) {
      logger.warn(`No context retrieved for question="${question}"`);
      return { question, answer: NO_CONTEXT_ANSWER, sourceChunks };
    }

    const context = buildContextBlock(sourceChunks);
    logger.info(`Calling LLM model '${model}' with context length=${context.length} and topK=${topK}`);

    let response: unknown;
    try {
      response = await this.chatClient.chat(model, buildMessages(context, question));
    } catch (error) {
      logger.error(`LLM call failed for question="${question}"`, error);
      throw error;
    }

    const answer = extractAnswerText(response);
    logger.success(`Answer generated (${answer.length} characters, ${sourceChunks.length} source chunks)`);

    return { question, answer, sourceChunks };
  }
}
