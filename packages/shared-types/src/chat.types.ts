// Chat session types (client side, held in memory only)

export type ChatRole = 'user' | 'assistant';

export interface ChatMessage {
  id: string;
  role: ChatRole;
  content: string;
  sql?: string;
  isError?: boolean;
  timestamp: string;
}

export type ChatSessionStatus = 'idle' | 'awaiting-response';
