import React from 'react';
import { Table } from 'lucide-react';
import { Card } from '../ui/Card';
import { Badge } from '../ui/Badge';
import { Spinner } from '../ui/Spinner';
import { ExampleQuestions } from '../chat/ExampleQuestions';
import type { BackendStatus } from '../../types/api';
import styles from './Sidebar.module.css';

export interface SidebarProps {
  schema: string | null;
  status: BackendStatus;
  apiUrl: string;
  exampleQuestions: readonly string[];
  onExampleSelect: (question: string) => void;
  examplesDisabled?: boolean;
}

const statusBadge: Record<BackendStatus, { variant: 'success' | 'error' | 'warning'; label: string }> = {
  connected: { variant: 'success', label: 'Backend Connected' },
  disconnected: { variant: 'error', label: 'Backend Disconnected' },
  checking: { variant: 'warning', label: 'Checking backend...' },
};

export const Sidebar: React.FC<SidebarProps> = ({
  schema,
  status,
  apiUrl,
  exampleQuestions,
  onExampleSelect,
  examplesDisabled = false,
}) => {
  const badge = statusBadge[status];

  return (
    <aside className={styles.sidebar}>
      <Card title="Database Schema" icon={<Table size={18} />}>
        {schema === null ? <Spinner size="sm" /> : <pre className={styles.schema}>{schema.trim()}</pre>}
      </Card>

      <ExampleQuestions questions={exampleQuestions} onSelect={onExampleSelect} disabled={examplesDisabled} />

      <div className={styles.connection}>
        <Badge variant={badge.variant}>{badge.label}</Badge>
        <code className={styles.apiUrl}>API URL: {apiUrl}</code>
      </div>
    </aside>
  );
};
