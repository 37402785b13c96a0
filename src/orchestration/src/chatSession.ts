/**
 * Interactive chat session
 * Holds the conversation history for display. Each question is answered
 * independently; history is never sent to the pipeline.
 */

import { ConversationTurn } from './types';
import { RagPipeline } from './ragPipeline';
import { logger } from './logger';

export interface ChatSessionOptions {
  model?: string;
  topK?: number;
}

export class ChatSession {
  private readonly turns: ConversationTurn[] = [];

  constructor(
    private readonly pipeline: Pick<RagPipeline, 'answerQuestion'>,
    private readonly options: ChatSessionOptions = {}
  ) {}

  /**
   * Answer one question. Failures become an inline error message so the
   * loop keeps running.
   */
  async ask(question: string): Promise<string> {
    logger.info(`Received user question (chars=${question.length})`);
    this.turns.push({ role: 'user', content: question });

    let answer: string;
    try {
      answer = await this.pipeline.answerQuestion(question, this.options.model, this.options.topK);
      logger.info(`Answer generated (chars=${answer.length})`);
    } catch (error) {
      logger.error('Error while generating answer for user input', error);
      answer = `Error while generating answer: ${error instanceof Error ? error.message : String(error)}`;
    }

    this.turns.push({ role: 'assistant', content: answer });
    logger.debug(`Chat history updated; total messages=${this.turns.length}`);
    return answer;
  }

  get history(): readonly ConversationTurn[] {
    return this.turns;
  }
}
