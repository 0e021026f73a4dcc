export const NO_RESULTS_MESSAGE = 'No results found for your query.';

/**
 * Turn a rendered result set into the message shown in the chat.
 * Presentation only: the rows are passed through untouched.
 */
export function formatSqlResult(result: string, sql: string): string {
  if (result.trim() === '') {
    return NO_RESULTS_MESSAGE;
  }

  // For simple counting queries
  if (sql.toUpperCase().includes('COUNT')) {
    return `The result is: ${result}`;
  }

  return `Here are the results:\n\n${result}`;
}
