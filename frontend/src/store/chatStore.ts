import { create } from 'zustand';
import type { AssistantReply, ChatMessage, ChatSessionStatus } from '../types/api';

interface ChatStore {
  sessionId: string;
  status: ChatSessionStatus;
  messages: ChatMessage[];
  /** Append the user's question and wait for the answer. Only from idle. */
  beginRequest: (question: string) => boolean;
  /** Append the assistant's answer and return to idle. Only while awaiting. */
  completeRequest: (reply: AssistantReply) => boolean;
  clearHistory: () => void;
}

const newMessage = (message: Omit<ChatMessage, 'id' | 'timestamp'>): ChatMessage => ({
  ...message,
  id: crypto.randomUUID(),
  timestamp: new Date().toISOString(),
});

export const useChatStore = create<ChatStore>((set, get) => ({
  sessionId: crypto.randomUUID(),
  status: 'idle',
  messages: [],

  beginRequest: (question) => {
    if (get().status !== 'idle') return false;
    set((state) => ({
      status: 'awaiting-response',
      messages: [...state.messages, newMessage({ role: 'user', content: question })],
    }));
    return true;
  },

  completeRequest: (reply) => {
    if (get().status !== 'awaiting-response') return false;
    set((state) => ({
      status: 'idle',
      messages: [...state.messages, newMessage({ role: 'assistant', ...reply })],
    }));
    return true;
  },

  clearHistory: () =>
    set({
      sessionId: crypto.randomUUID(),
      status: 'idle',
      messages: [],
    }),
}));
