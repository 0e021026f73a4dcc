import { describe, it, expect, beforeEach } from 'vitest';
import { useChatStore } from '../store/chatStore';

describe('chatStore', () => {
  beforeEach(() => {
    useChatStore.getState().clearHistory();
  });

  it('starts idle with an empty history', () => {
    const state = useChatStore.getState();

    expect(state.status).toBe('idle');
    expect(state.messages).toEqual([]);
  });

  it('appends the question and waits for the answer', () => {
    expect(useChatStore.getState().beginRequest('How many customers are there?')).toBe(true);

    const { status, messages } = useChatStore.getState();
    expect(status).toBe('awaiting-response');
    expect(messages).toHaveLength(1);
    expect(messages[0]).toMatchObject({ role: 'user', content: 'How many customers are there?' });
  });

  it('refuses a second question while awaiting', () => {
    useChatStore.getState().beginRequest('First question');

    expect(useChatStore.getState().beginRequest('Second question')).toBe(false);
    expect(useChatStore.getState().messages).toHaveLength(1);
  });

  it('appends the answer and returns to idle', () => {
    const store = useChatStore.getState();
    store.beginRequest('How many customers are there?');

    expect(store.completeRequest({ content: 'The result is: 3', sql: 'SELECT COUNT(*) FROM customers;' })).toBe(true);

    const { status, messages } = useChatStore.getState();
    expect(status).toBe('idle');
    expect(messages.map((m) => m.role)).toEqual(['user', 'assistant']);
    expect(messages[1]).toMatchObject({
      role: 'assistant',
      content: 'The result is: 3',
      sql: 'SELECT COUNT(*) FROM customers;',
    });
  });

  it('ignores an answer when nothing is pending', () => {
    expect(useChatStore.getState().completeRequest({ content: 'stray' })).toBe(false);
    expect(useChatStore.getState().messages).toEqual([]);
  });

  it('keeps history across failed answers', () => {
    const store = useChatStore.getState();
    store.beginRequest('First');
    store.completeRequest({ content: 'The result is: 1' });
    store.beginRequest('Second');
    store.completeRequest({ content: '❌ Connection error: Network Error', isError: true });

    const { messages } = useChatStore.getState();
    expect(messages.map((m) => m.content)).toEqual([
      'First',
      'The result is: 1',
      'Second',
      '❌ Connection error: Network Error',
    ]);
    expect(messages[3].isError).toBe(true);
  });

  it('gives every message its own id', () => {
    const store = useChatStore.getState();
    store.beginRequest('Question');
    store.completeRequest({ content: 'Answer' });

    const [question, answer] = useChatStore.getState().messages;
    expect(question.id).not.toBe(answer.id);
  });

  it('clears history and starts a new session', () => {
    const store = useChatStore.getState();
    const previousSession = store.sessionId;
    store.beginRequest('Question');
    store.completeRequest({ content: 'Answer' });

    store.clearHistory();

    const state = useChatStore.getState();
    expect(state.messages).toEqual([]);
    expect(state.status).toBe('idle');
    expect(state.sessionId).not.toBe(previousSession);
  });
});
