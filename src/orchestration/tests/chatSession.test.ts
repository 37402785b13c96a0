/**
 * Unit tests for the interactive chat session
 */

import { ChatSession } from '../src/chatSession';

describe('Chat Session Module', () => {
  it('should record the question and answer in order', async () => {
    const pipeline = { answerQuestion: jest.fn().mockResolvedValue('Four attributes.') };
    const session = new ChatSession(pipeline, { model: 'llama3.1', topK: 3 });

    const answer = await session.ask('What is an estimand?');

    expect(answer).toBe('Four attributes.');
    expect(pipeline.answerQuestion).toHaveBeenCalledWith('What is an estimand?', 'llama3.1', 3);
    expect(session.history).toEqual([
      { role: 'user', content: 'What is an estimand?' },
      { role: 'assistant', content: 'Four attributes.' }
    ]);
  });

  it('should turn a failure into an inline error and keep going', async () => {
    const pipeline = {
      answerQuestion: jest.fn()
        .mockRejectedValueOnce(new Error('connect ECONNREFUSED'))
        .mockResolvedValueOnce('Recovered.')
    };
    const session = new ChatSession(pipeline);

    expect(await session.ask('first')).toBe('Error while generating answer: connect ECONNREFUSED');
    expect(await session.ask('second')).toBe('Recovered.');
    expect(session.history.map(turn => turn.content)).toEqual([
      'first',
      'Error while generating answer: connect ECONNREFUSED',
      'second',
      'Recovered.'
    ]);
  });

  it('should ask each question independently of history', async () => {
    const pipeline = { answerQuestion: jest.fn().mockResolvedValue('ok') };
    const session = new ChatSession(pipeline);

    await session.ask('one');
    await session.ask('two');

    expect(pipeline.answerQuestion).toHaveBeenLastCalledWith('two', undefined, undefined);
  });
});
