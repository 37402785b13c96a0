/**
 * Chat model clients
 * Both clients send the same message list; their replies differ in shape:
 * - Ollama: { message: { role, content } }
 * - Groq (OpenAI-compatible): { choices: [{ message: { role, content } }] }
 * extractAnswerText is the single place that knows both shapes.
 */

import axios from 'axios';
import Groq from 'groq-sdk';
import { ChatMessage, GroqConfig } from './types';
import { UnrecognizedResponseShapeError } from './errors';
import { logger } from './logger';

export interface ChatClient {
  chat(model: string, messages: ChatMessage[]): Promise<unknown>;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
}

export class OllamaChatClient implements ChatClient {
  constructor(
    private readonly baseUrl: string,
    private readonly options: ChatOptions = {}
  ) {}

  async chat(model: string, messages: ChatMessage[]): Promise<unknown> {
    logger.debug(`Ollama chat: model=${model}, messages=${messages.length}`);

    const response = await axios.post<unknown>(`${this.baseUrl}/api/chat`, {
      model,
      messages,
      stream: false,
      options: {
        temperature: this.options.temperature,
        num_predict: this.options.maxTokens
      }
    });

    return response.data;
  }
}

export class GroqChatClient implements ChatClient {
  private readonly client: Groq;

  constructor(
    config: GroqConfig,
    private readonly options: ChatOptions = {}
  ) {
    this.client = new Groq({ apiKey: config.apiKey });
  }

  async chat(model: string, messages: ChatMessage[]): Promise<unknown> {
    logger.debug(`Groq chat: model=${model}, messages=${messages.length}`);

    return this.client.chat.completions.create({
      model,
      messages,
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readMessageContent(holder: unknown): string | undefined {
  if (!isRecord(holder) || !isRecord(holder.message)) {
    return undefined;
  }
  const { content } = holder.message;
  return typeof content === 'string' && content.trim() !== '' ? content : undefined;
}

/**
 * Pull the answer text out of a chat reply, trying the message shape first
 * and the choices shape second. Blank content counts as no answer.
 */
export function extractAnswerText(response: unknown): string {
  const direct = readMessageContent(response);
  if (direct !== undefined) {
    return direct;
  }

  if (isRecord(response) && Array.isArray(response.choices) && response.choices.length > 0) {
    const fromChoice = readMessageContent(response.choices[0]);
    if (fromChoice !== undefined) {
      return fromChoice;
    }
  }

  throw new UnrecognizedResponseShapeError(response);
}
