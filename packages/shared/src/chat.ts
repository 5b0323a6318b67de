// Tutorial assistant chat types

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface ChatExchange {
  question: string;
  answer: string;
}

export interface ChatResponse {
  response: string;
  timestamp: number; // epoch seconds
}
