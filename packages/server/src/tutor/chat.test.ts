import { describe, it, expect } from 'vitest';
import type { ChatMessage } from '@tutorpath/shared';
import { selectLastExchange, toChatResponse } from './chat.js';

describe('selectLastExchange', () => {
  const history: ChatMessage[] = [
    { role: 'user', content: 'Q1' },
    { role: 'assistant', content: 'A1' },
    { role: 'user', content: 'Q2' },
    { role: 'assistant', content: 'A2' },
  ];

  it('returns the most recent question and its answer', () => {
    expect(selectLastExchange(history)).toEqual({ question: 'Q2', answer: 'A2' });
  });

  it('skips a trailing unanswered question', () => {
    expect(selectLastExchange([...history, { role: 'user', content: 'Q3' }])).toEqual({ question: 'Q2', answer: 'A2' });
  });

  it('needs a full exchange', () => {
    expect(selectLastExchange([])).toBeUndefined();
    expect(selectLastExchange([{ role: 'user', content: 'Q1' }])).toBeUndefined();
    expect(selectLastExchange([{ role: 'assistant', content: 'Welcome!' }, { role: 'user', content: 'Q1' }])).toBeUndefined();
  });
});

describe('toChatResponse', () => {
  it('passes the reply through with an epoch-seconds timestamp', () => {
    expect(toChatResponse('  Docker packages apps.  ', 1_700_000_000_000)).toEqual({
      response: '  Docker packages apps.  ',
      timestamp: 1_700_000_000,
    });
  });
});
