import React from 'react';
import { Lightbulb } from 'lucide-react';
import { Card } from '../ui/Card';
import { Button } from '../ui/Button';
import styles from './ExampleQuestions.module.css';

export interface ExampleQuestionsProps {
  questions: readonly string[];
  onSelect: (question: string) => void;
  disabled?: boolean;
}

export const ExampleQuestions: React.FC<ExampleQuestionsProps> = ({ questions, onSelect, disabled = false }) => {
  if (questions.length === 0) return null;

  return (
    <Card title="Example Questions" icon={<Lightbulb size={18} />} padding="md">
      <div className={styles.list}>
        {questions.map((question) => (
          <Button
            key={question}
            variant="secondary"
            size="sm"
            fullWidth
            disabled={disabled}
            onClick={() => onSelect(question)}
          >
            {question}
          </Button>
        ))}
      </div>
    </Card>
  );
};
