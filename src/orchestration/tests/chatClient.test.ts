/**
 * Unit tests for chat clients and reply normalization
 */

import axios from 'axios';
import { GroqChatClient, OllamaChatClient, extractAnswerText } from '../src/chatClient';
import { UnrecognizedResponseShapeError } from '../src/errors';
import { ChatMessage } from '../src/types';
import { axiosResponse } from './test-helpers';

// Mock Groq SDK
jest.mock('groq-sdk');
import Groq from 'groq-sdk';

jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('Chat Client Module', () => {
  const messages: ChatMessage[] = [
    { role: 'system', content: 'Answer from context.' },
    { role: 'user', content: 'What is an estimand?' }
  ];

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('Reply normalization', () => {
    it('should read the message shape', () => {
      expect(extractAnswerText({ message: { role: 'assistant', content: 'Four attributes.' } }))
        .toBe('Four attributes.');
    });

    it('should read the choices shape', () => {
      expect(extractAnswerText({ choices: [{ index: 0, message: { role: 'assistant', content: 'Four attributes.' } }] }))
        .toBe('Four attributes.');
    });

    it('should give the same text for both shapes', () => {
      const text = 'The estimand is defined by four attributes.';

      expect(extractAnswerText({ message: { content: text } }))
        .toBe(extractAnswerText({ choices: [{ message: { content: text } }] }));
    });

    it('should prefer the message shape when both are present', () => {
      expect(extractAnswerText({
        message: { content: 'direct' },
        choices: [{ message: { content: 'from choices' } }]
      })).toBe('direct');
    });

    it('should fall back to choices when message content is empty', () => {
      expect(extractAnswerText({
        message: { content: '' },
        choices: [{ message: { content: 'from choices' } }]
      })).toBe('from choices');
    });

    it('should fall back to choices when message has no text', () => {
      expect(extractAnswerText({
        message: { content: null },
        choices: [{ message: { content: 'from choices' } }]
      })).toBe('from choices');
    });

    it.each([
      ['null', null],
      ['a plain string', 'answer'],
      ['an empty object', {}],
      ['empty choices', { choices: [] }],
      ['a null choice content', { choices: [{ message: { content: null } }] }],
      ['a numeric content', { message: { content: 42 } }],
      ['an empty content', { message: { content: '' } }],
      ['a blank choice content', { choices: [{ message: { content: '  \n' } }] }]
    ])('should reject %s', (_label, response) => {
      expect(() => extractAnswerText(response)).toThrow(UnrecognizedResponseShapeError);
    });
  });

  describe('Ollama client', () => {
    it('should post a non-streaming chat request', async () => {
      const reply = { model: 'deepseek-r1', message: { role: 'assistant', content: 'ok' }, done: true };
      mockedAxios.post.mockResolvedValue(axiosResponse(reply));

      const response = await new OllamaChatClient('http://ollama.test:11434', { temperature: 0.2 })
        .chat('deepseek-r1', messages);

      expect(mockedAxios.post).toHaveBeenCalledWith('http://ollama.test:11434/api/chat', {
        model: 'deepseek-r1',
        messages,
        stream: false,
        options: { temperature: 0.2, num_predict: undefined }
      });
      expect(response).toEqual(reply);
    });

    it('should propagate request failures unchanged', async () => {
      const failure = new Error('model not found');
      mockedAxios.post.mockRejectedValue(failure);

      await expect(new OllamaChatClient('http://ollama.test:11434').chat('missing', messages))
        .rejects.toBe(failure);
    });
  });

  describe('Groq client', () => {
    it('should send the messages through chat completions', async () => {
      const completion = { choices: [{ message: { role: 'assistant', content: 'Four attributes.' } }] };
      const mockCreate = jest.fn().mockResolvedValue(completion);

      (Groq as jest.MockedClass<typeof Groq>).mockImplementation(() => ({
        chat: {
          completions: {
            create: mockCreate
          }
        }
      } as unknown as Groq));

      const client = new GroqChatClient({ apiKey: 'test-api-key' }, { temperature: 0.2, maxTokens: 1000 });
      const response = await client.chat('llama-3.3-70b-versatile', messages);

      expect(Groq).toHaveBeenCalledWith({ apiKey: 'test-api-key' });
      expect(mockCreate).toHaveBeenCalledWith({
        model: 'llama-3.3-70b-versatile',
        messages,
        temperature: 0.2,
        max_tokens: 1000
      });
      expect(extractAnswerText(response)).toBe('Four attributes.');
    });
  });
});
