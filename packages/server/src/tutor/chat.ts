// ============================================================================
// TutorPath — Chat Grounding
// Only the most recent user → assistant exchange is carried into the prompt.
// ============================================================================
import type { ChatExchange, ChatMessage, ChatResponse } from '@tutorpath/shared';

export function selectLastExchange(history: ChatMessage[]): ChatExchange | undefined {
  for (let i = history.length - 1; i > 0; i--) {
    const answer = history[i];
    const question = history[i - 1];
    if (answer.role === 'assistant' && question.role === 'user' && question.content.trim() && answer.content.trim()) {
      return { question: question.content, answer: answer.content };
    }
  }
  return undefined;
}

export function toChatResponse(reply: string, now: number = Date.now()): ChatResponse {
  return { response: reply, timestamp: now / 1000 };
}
