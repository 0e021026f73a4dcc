import React from 'react';
import { Database } from 'lucide-react';
import styles from './Header.module.css';

export const Header: React.FC = () => {
  return (
    <header className={styles.header}>
      <div className={styles.content}>
        <div className={styles.logo}>
          <Database size={22} />
        </div>
        <div>
          <h1 className={styles.title}>Text-to-SQL Chatbot</h1>
          <p className={styles.caption}>
            Ask your question in natural language, and get a SQL result from the Chinook database.
          </p>
        </div>
      </div>
    </header>
  );
};
