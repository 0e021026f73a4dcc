import React, { useState, useRef, useEffect } from 'react';
import { Send } from 'lucide-react';
import { Button } from '../ui/Button';
import { Textarea } from '../ui/Textarea';
import styles from './ChatInput.module.css';

export interface ChatInputProps {
  onSend: (question: string) => void;
  isAwaiting?: boolean;
  disabled?: boolean;
}

export const ChatInput: React.FC<ChatInputProps> = ({ onSend, isAwaiting = false, disabled = false }) => {
  const [question, setQuestion] = useState('');
  const textareaRef = useRef<HTMLTextAreaElement>(null);

  const handleSend = () => {
    const trimmed = question.trim();
    if (trimmed && !isAwaiting && !disabled) {
      onSend(trimmed);
      setQuestion('');
    }
  };

  const handleKeyDown = (e: React.KeyboardEvent<HTMLTextAreaElement>) => {
    if (e.key === 'Enter' && !e.shiftKey) {
      e.preventDefault();
      handleSend();
    }
  };

  // Grow with the content
  useEffect(() => {
    if (textareaRef.current) {
      textareaRef.current.style.height = 'auto';
      textareaRef.current.style.height = `${textareaRef.current.scrollHeight}px`;
    }
  }, [question]);

  return (
    <div className={styles.container}>
      <Textarea
        ref={textareaRef}
        rows={1}
        value={question}
        onChange={(e) => setQuestion(e.target.value)}
        onKeyDown={handleKeyDown}
        placeholder="Type your question here..."
        aria-label="Question"
        disabled={disabled || isAwaiting}
      />
      <Button
        onClick={handleSend}
        isLoading={isAwaiting}
        disabled={disabled || !question.trim()}
        icon={<Send size={18} />}
      >
        Send
      </Button>
    </div>
  );
};
