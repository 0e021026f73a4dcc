import React from 'react';
import { clsx } from 'clsx';
import { Avatar } from '../ui/Avatar';
import styles from './TypingIndicator.module.css';

export const TypingIndicator: React.FC = () => (
  <div className={clsx(styles.typingIndicator, 'animate-slide-in')} role="status">
    <Avatar variant="bot" size="md" />
    <div className={styles.bubble}>
      <span className={styles.dot} />
      <span className={styles.dot} />
      <span className={styles.dot} />
      <span className={styles.text}>Thinking...</span>
    </div>
  </div>
);
