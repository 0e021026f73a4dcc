// Markdown fence with an optional language tag. SQL dialect tags are removed
// even when the statement follows on the same line; any other tag only when
// it ends its line, so an inline "```SELECT" keeps its statement.
const CODE_FENCE =
  /```(?:(?:sqlite|postgresql|postgres|sql)\b[ \t]*(?:\r?\n)?|[a-z0-9_+-]*[ \t]*(?:\r?\n|$))?/gi;
// Whitespace, comments and opening parentheses allowed before the first keyword
const LEADING_TRIVIA = /^(?:\s|--[^\n]*(?:\n|$)|\/\*[\s\S]*?\*\/|\()*/;
const LEADING_LABEL = /^(SQL Query:|Query:|SQL:)\s*/i;

const STATEMENT_KEYWORDS = new Set([
  'SELECT',
  'WITH',
  'INSERT',
  'UPDATE',
  'DELETE',
  'REPLACE',
  'CREATE',
  'DROP',
  'ALTER',
  'PRAGMA',
  'EXPLAIN',
  'VALUES',
]);

export type StatementValidation = { valid: true } | { valid: false; reason: string };

/**
 * Recover a single SQL statement from a raw model completion.
 *
 * Best-effort text cleanup, not a parser: fences and a leading label are
 * removed, and everything after the first `;` is dropped.
 */
export function cleanSqlQuery(raw: string): string {
  let sql = raw.trim();

  sql = sql.replace(CODE_FENCE, '').trim();
  sql = sql.replace(LEADING_LABEL, '');

  const terminator = sql.indexOf(';');
  if (terminator !== -1) {
    sql = `${sql.slice(0, terminator)};`;
  }

  return sql.trim();
}

/**
 * Check that cleaned text looks like exactly one SQL statement before it is
 * handed to the database.
 */
export function validateStatement(sql: string): StatementValidation {
  const body = sql.trim().replace(/;$/, '').trim();

  if (body.length === 0) {
    return { valid: false, reason: 'No SQL statement found in the model response' };
  }

  if (body.includes(';')) {
    return { valid: false, reason: 'Multiple SQL statements are not allowed' };
  }

  const firstWord = /^[A-Za-z]+/.exec(body.replace(LEADING_TRIVIA, ''))?.[0]?.toUpperCase();
  if (!firstWord || !STATEMENT_KEYWORDS.has(firstWord)) {
    return {
      valid: false,
      reason: `Model response is not a SQL statement: "${body.slice(0, 40)}"`,
    };
  }

  return { valid: true };
}
