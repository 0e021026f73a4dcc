import { isAbsolute, resolve } from 'path';
import type { FastifyBaseLogger } from 'fastify';
import type { Env } from '../../config/env.js';
import { rootDir } from '../../config/env.js';
import type { QueryDatabase } from './database.types.js';
import { PostgresService } from './postgres.service.js';
import { SqliteService } from './sqlite.service.js';

export type { ExecutionOutcome, QueryDatabase, SqlDialect } from './database.types.js';

const POSTGRES_URL = /^postgres(ql)?:\/\//i;

/**
 * Map DATABASE_URL to a SQLite filename. Accepts `sqlite:///path`,
 * `sqlite:path` or a bare path; relative paths resolve from the repo root.
 */
export function resolveSqliteFilename(url: string, baseDir: string = rootDir): string {
  let filename = url;
  if (filename.startsWith('sqlite:///')) {
    filename = filename.slice('sqlite:///'.length);
  } else if (filename.startsWith('sqlite:')) {
    filename = filename.slice('sqlite:'.length);
  }

  if (filename === ':memory:' || isAbsolute(filename)) {
    return filename;
  }
  return resolve(baseDir, filename);
}

export function createDatabase(
  env: Pick<Env, 'DATABASE_URL' | 'SQL_READ_ONLY' | 'SQL_STATEMENT_TIMEOUT_MS'>,
  logger: FastifyBaseLogger
): QueryDatabase {
  if (POSTGRES_URL.test(env.DATABASE_URL)) {
    return new PostgresService({
      connectionString: env.DATABASE_URL,
      readOnly: env.SQL_READ_ONLY,
      statementTimeoutMs: env.SQL_STATEMENT_TIMEOUT_MS,
      logger,
    });
  }

  return new SqliteService({
    filename: resolveSqliteFilename(env.DATABASE_URL),
    readOnly: env.SQL_READ_ONLY,
    logger,
  });
}
