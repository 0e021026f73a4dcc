import React, { useEffect, useState } from 'react';
import { ChevronDown, ChevronUp, Copy, Check, Search } from 'lucide-react';
import { IconButton } from '../ui/IconButton';
import styles from './SqlBlock.module.css';

export interface SqlBlockProps {
  sql: string;
  defaultExpanded?: boolean;
}

export const SqlBlock: React.FC<SqlBlockProps> = ({ sql, defaultExpanded = false }) => {
  const [expanded, setExpanded] = useState(defaultExpanded);
  const [copied, setCopied] = useState(false);

  useEffect(() => {
    if (!copied) return;
    const timer = setTimeout(() => setCopied(false), 2000);
    return () => clearTimeout(timer);
  }, [copied]);

  const copySql = async () => {
    try {
      await navigator.clipboard.writeText(sql);
      setCopied(true);
    } catch (error) {
      console.error('Failed to copy SQL:', error);
    }
  };

  return (
    <div className={styles.container}>
      <button
        type="button"
        className={styles.toggle}
        onClick={() => setExpanded((value) => !value)}
        aria-expanded={expanded}
      >
        <Search size={14} />
        <span>Generated SQL</span>
        {expanded ? <ChevronUp size={14} /> : <ChevronDown size={14} />}
      </button>

      {expanded && (
        <div className={styles.body}>
          <IconButton label={copied ? 'Copied' : 'Copy SQL'} variant="ghost" size="sm" onClick={copySql} className={styles.copy}>
            {copied ? <Check size={14} /> : <Copy size={14} />}
          </IconButton>
          <pre className={styles.code}>
            <code>{sql}</code>
          </pre>
        </div>
      )}
    </div>
  );
};
