import React from 'react';
import { clsx } from 'clsx';
import { Avatar } from '../ui/Avatar';
import { SqlBlock } from './SqlBlock';
import type { ChatMessage } from '../../types/api';
import styles from './ChatMessage.module.css';

export interface ChatMessageProps {
  message: ChatMessage;
}

const formatTime = (timestamp: string) =>
  new Date(timestamp).toLocaleTimeString([], { hour: '2-digit', minute: '2-digit' });

export const ChatMessageComponent: React.FC<ChatMessageProps> = ({ message }) => {
  const { role, content, sql, isError, timestamp } = message;

  return (
    <div className={clsx(styles.message, styles[`message--${role}`], 'animate-slide-in')}>
      <Avatar variant={role === 'user' ? 'user' : 'bot'} size="md" />
      <div className={styles.content}>
        <div className={clsx(styles.bubble, styles[`bubble--${role}`], isError && styles['bubble--error'])}>
          <div className={styles.text}>{content}</div>
          {sql && <SqlBlock sql={sql} />}
        </div>
        <div className={clsx(styles.timestamp, styles[`timestamp--${role}`])}>{formatTime(timestamp)}</div>
      </div>
    </div>
  );
};
