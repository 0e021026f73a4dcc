import React, { useEffect, useRef } from 'react';
import { ChatMessageComponent } from './ChatMessage';
import { TypingIndicator } from './TypingIndicator';
import type { ChatMessage } from '../../types/api';
import styles from './ChatContainer.module.css';

export interface ChatContainerProps {
  messages: ChatMessage[];
  isAwaiting?: boolean;
  emptyStateMessage?: string;
}

export const ChatContainer: React.FC<ChatContainerProps> = ({
  messages,
  isAwaiting = false,
  emptyStateMessage = 'Ask a question about the Chinook music store database to get started.',
}) => {
  const messagesEndRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    // Auto-scroll to bottom when new messages arrive
    messagesEndRef.current?.scrollIntoView({ behavior: 'smooth' });
  }, [messages, isAwaiting]);

  return (
    <div className={styles.container} aria-live="polite">
      {messages.length === 0 && !isAwaiting ? (
        <div className={styles.emptyState}>
          <p>{emptyStateMessage}</p>
        </div>
      ) : (
        <>
          {messages.map((message) => (
            <ChatMessageComponent key={message.id} message={message} />
          ))}
          {isAwaiting && <TypingIndicator />}
          <div ref={messagesEndRef} />
        </>
      )}
    </div>
  );
};
