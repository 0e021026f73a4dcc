import { useCallback } from 'react';
import { chatService, toAssistantReply } from '../services/chatService';
import { useChatStore } from '../store/chatStore';

export const useChatSession = () => {
  const { sessionId, status, messages, beginRequest, completeRequest, clearHistory } = useChatStore();

  const sendQuestion = useCallback(
    async (question: string) => {
      const trimmed = question.trim();
      if (!trimmed || !beginRequest(trimmed)) return;

      const requestSession = useChatStore.getState().sessionId;
      const response = await chatService.sendQuery(trimmed);

      // History was cleared while the request was in flight
      if (useChatStore.getState().sessionId !== requestSession) return;

      completeRequest(toAssistantReply(response));
    },
    [beginRequest, completeRequest]
  );

  return {
    sessionId,
    messages,
    isAwaiting: status === 'awaiting-response',
    sendQuestion,
    clearHistory,
  };
};
