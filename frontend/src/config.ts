export const API_URL: string = import.meta.env.VITE_API_URL || 'http://localhost:8000';

// Request timeouts (ms)
export const TIMEOUTS = {
  health: 5_000,
  schema: 10_000,
  query: 30_000,
} as const;

export const EXAMPLE_QUESTIONS: readonly string[] = [
  'How many customers are from each country?',
  'What are the top 10 best-selling tracks?',
  'Which artist has the most albums?',
  'What is the total revenue by year?',
  'Show me all customers from Canada',
  'Which customers are from Brazil?',
  "What are the names of all tracks in the 'Rock' genre?",
  'What are the top 5 most expensive tracks?',
];
