import { describe, it, expect } from 'vitest';
import { parseEnv } from '../../config/env.js';
import { start } from '../../server.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('parseEnv', () => {
  it('applies defaults when only the API key is set', () => {
    const env = parseEnv({ GOOGLE_API_KEY: 'test-api-key' });

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      API_PORT: 8000,
      API_HOST: 'localhost',
      GEMINI_MODEL: 'gemini-1.5-flash',
      GEMINI_TIMEOUT_MS: 30000,
      DATABASE_URL: './data/chinook.db',
      SQL_READ_ONLY: true,
      SQL_STATEMENT_TIMEOUT_MS: 30000,
      LANGFUSE_HOST: 'https://cloud.langfuse.com',
    });
    expect(env.LANGFUSE_PUBLIC_KEY).toBeUndefined();
  });

  it.each([
    ['false', false],
    ['0', false],
    ['true', true],
    ['1', true],
  ])('reads SQL_READ_ONLY=%s as %s', (value, expected) => {
    expect(parseEnv({ GOOGLE_API_KEY: 'test-api-key', SQL_READ_ONLY: value }).SQL_READ_ONLY).toBe(expected);
  });

  it('fails without the model API key', () => {
    expect(() => parseEnv({})).toThrow(ConfigurationError);

    let problems: string[] = [];
    try {
      parseEnv({ GOOGLE_API_KEY: '' });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        problems = error.problems;
      }
    }
    expect(problems).toEqual(['GOOGLE_API_KEY: Google API key is required']);
  });
});

describe('start', () => {
  it('refuses to start without the model API key', async () => {
    await expect(start({ NODE_ENV: 'test' })).rejects.toBeInstanceOf(ConfigurationError);
  });
});
