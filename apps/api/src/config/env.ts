import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { ConfigurationError } from '../utils/errors.js';

// Load .env from project root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
export const rootDir = join(__dirname, '../../../..');
dotenv.config({ path: join(rootDir, '.env') });

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

export const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PORT: z.string().default('8000').transform(Number),
  API_HOST: z.string().default('localhost'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Gemini (model client)
  GOOGLE_API_KEY: z.string({ required_error: 'Google API key is required' }).min(1, 'Google API key is required'),
  GEMINI_MODEL: z.string().default('gemini-1.5-flash'),
  GEMINI_TIMEOUT_MS: z.string().default('30000').transform(Number),

  // Database: a SQLite file path, a sqlite: URI or a postgres:// URI
  DATABASE_URL: z.string().min(1).default('./data/chinook.db'),
  SQL_READ_ONLY: booleanFlag,
  SQL_STATEMENT_TIMEOUT_MS: z.string().default('30000').transform(Number),

  // Langfuse (optional - tracing and managed prompts)
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_HOST: z.string().url().default('https://cloud.langfuse.com'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate environment variables. Throws a ConfigurationError listing every
 * invalid or missing variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Environment validation failed:\n${problems.join('\n')}`, problems);
  }
  return parsed.data;
}
