import Database from 'better-sqlite3';
import type { FastifyBaseLogger } from 'fastify';
import type { ExecutionOutcome, QueryDatabase } from './database.types.js';
import { renderRows, toCells } from './render-rows.js';
import { errorMessage } from '../../utils/errors.js';

export interface SqliteServiceOptions {
  filename: string;
  readOnly: boolean;
  logger: FastifyBaseLogger;
}

export class SqliteService implements QueryDatabase {
  readonly dialect = 'sqlite';
  private db: Database.Database;
  private logger: FastifyBaseLogger;

  constructor({ filename, readOnly, logger }: SqliteServiceOptions) {
    this.logger = logger;
    // The database is pre-existing; never create or migrate it here.
    this.db = new Database(filename, { readonly: readOnly, fileMustExist: true });
    this.logger.info({ filename, readOnly }, 'SQLite database opened');
  }

  /**
   * Execute one statement and render its rows. Statements that return no
   * rows (DML, DDL) render as an empty string.
   */
  async run(sql: string): Promise<ExecutionOutcome> {
    const start = Date.now();
    try {
      const statement = this.db.prepare(sql);

      let result = '';
      if (statement.reader) {
        // 64-bit integers come back as bigint so large values render exactly
        result = renderRows(statement.safeIntegers(true).raw(true).all().map(toCells));
      } else {
        statement.run();
      }

      this.logger.debug({ durationMs: Date.now() - start, sql: sql.substring(0, 100) }, 'Query executed');
      return { ok: true, result };
    } catch (error) {
      this.logger.warn({ err: error, sql }, 'Query failed');
      return { ok: false, error: errorMessage(error) };
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      this.logger.error({ err: error }, 'Database health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    this.db.close();
    this.logger.info('SQLite database closed');
  }
}
