import React from 'react';
import { RefreshCw, Trash2 } from 'lucide-react';
import { Alert, Button, Card, Spinner } from '../components/ui';
import { ChatContainer } from '../components/chat/ChatContainer';
import { ChatInput } from '../components/chat/ChatInput';
import { Sidebar } from '../components/layout/Sidebar';
import { useBackendStatus } from '../hooks/useBackendStatus';
import { useChatSession } from '../hooks/useChatSession';
import { API_URL, EXAMPLE_QUESTIONS } from '../config';
import styles from './ChatPage.module.css';

export const ChatPage: React.FC = () => {
  const { status, schema, refresh } = useBackendStatus();
  const { messages, isAwaiting, sendQuestion, clearHistory } = useChatSession();

  if (status === 'disconnected') {
    return (
      <div className={styles.unavailable}>
        <Alert
          variant="error"
          title="Backend service is not available"
          message="Please check your backend connection."
          action={{ label: 'Retry', icon: <RefreshCw size={16} />, onClick: refresh }}
        />
        <Alert variant="info" message={`Trying to connect to: ${API_URL}`} />
      </div>
    );
  }

  if (status === 'checking' && schema === null) {
    return (
      <div className={styles.loading}>
        <Spinner size="lg" />
      </div>
    );
  }

  return (
    <div className={styles.chatPage}>
      <Sidebar
        schema={schema}
        status={status}
        apiUrl={API_URL}
        exampleQuestions={EXAMPLE_QUESTIONS}
        onExampleSelect={sendQuestion}
        examplesDisabled={isAwaiting}
      />

      <Card variant="elevated" padding="md" className={styles.chatCard}>
        <ChatContainer messages={messages} isAwaiting={isAwaiting} />
        <ChatInput onSend={sendQuestion} isAwaiting={isAwaiting} />
        <div className={styles.actions}>
          <Button
            variant="ghost"
            size="sm"
            icon={<Trash2 size={16} />}
            onClick={clearHistory}
            disabled={isAwaiting || messages.length === 0}
          >
            Clear Chat History
          </Button>
          <Button variant="ghost" size="sm" icon={<RefreshCw size={16} />} onClick={refresh}>
            Refresh Connection
          </Button>
        </div>
      </Card>
    </div>
  );
};
