import { describe, it, expect } from 'vitest';
import { formatSqlResult, NO_RESULTS_MESSAGE } from '../../services/sql/result-formatter.js';

describe('formatSqlResult', () => {
  it('returns the no-results message for an empty result', () => {
    expect(formatSqlResult('', 'SELECT * FROM customers;')).toBe(NO_RESULTS_MESSAGE);
    expect(NO_RESULTS_MESSAGE.toLowerCase()).toBe('no results found for your query.');
  });

  it('treats whitespace-only results as empty', () => {
    expect(formatSqlResult('  \n\t', 'SELECT COUNT(*) FROM customers;')).toBe(NO_RESULTS_MESSAGE);
  });

  it('prefixes counting queries with "The result is:"', () => {
    expect(formatSqlResult('3', 'SELECT count(*) FROM customers;')).toBe('The result is: 3');
    expect(formatSqlResult('3', 'SELECT COUNT(*) AS n FROM customers;')).toBe('The result is: 3');
  });

  it('uses a generic header for other queries', () => {
    expect(formatSqlResult('Lia, Moreira\nRui, Costa', 'SELECT FirstName, LastName FROM customers;')).toBe(
      'Here are the results:\n\nLia, Moreira\nRui, Costa'
    );
  });

  it('matches COUNT anywhere in the statement, column names included', () => {
    expect(formatSqlResult('Lia', "SELECT FirstName FROM customers WHERE Country = 'Brazil';")).toBe(
      'The result is: Lia'
    );
    expect(formatSqlResult('7', 'SELECT account_count FROM summary;')).toBe('The result is: 7');
  });
});
