import pg from 'pg';
import type { FastifyBaseLogger } from 'fastify';
import type { ExecutionOutcome, QueryDatabase } from './database.types.js';
import { renderRows } from './render-rows.js';
import { errorMessage } from '../../utils/errors.js';

const { Pool } = pg;

export interface PostgresServiceOptions {
  connectionString: string;
  readOnly: boolean;
  statementTimeoutMs: number;
  logger: FastifyBaseLogger;
}

export class PostgresService implements QueryDatabase {
  readonly dialect = 'postgres';
  private pool: pg.Pool;
  private readOnly: boolean;
  private statementTimeoutMs: number;
  private logger: FastifyBaseLogger;

  constructor({ connectionString, readOnly, statementTimeoutMs, logger }: PostgresServiceOptions) {
    this.readOnly = readOnly;
    this.statementTimeoutMs = statementTimeoutMs;
    this.logger = logger;
    this.pool = new Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });

    // Handle pool errors
    this.pool.on('error', (err) => {
      this.logger.error({ err }, 'Unexpected error on idle client');
    });

    this.logger.info({ readOnly }, 'PostgreSQL connection pool initialized');
  }

  /**
   * Execute SQL query for data retrieval (for AI-generated queries).
   * Runs in its own transaction with a statement timeout; read-only mode
   * makes the database reject writes.
   */
  async run(sql: string): Promise<ExecutionOutcome> {
    const start = Date.now();
    try {
      const result = await this.transaction(async (client) => {
        await client.query(`SET LOCAL statement_timeout = ${Math.trunc(this.statementTimeoutMs)}`);
        return client.query<unknown[]>({ text: sql, rowMode: 'array' });
      });

      this.logger.debug({ durationMs: Date.now() - start, sql: sql.substring(0, 100) }, 'Query executed');
      return { ok: true, result: renderRows(result.rows) };
    } catch (error) {
      this.logger.warn({ err: error, sql }, 'Query failed');
      return { ok: false, error: errorMessage(error) };
    }
  }

  /**
   * Transaction support
   */
  private async transaction<T>(callback: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query(this.readOnly ? 'BEGIN READ ONLY' : 'BEGIN');
      const result = await callback(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error({ err: error }, 'Database health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('PostgreSQL connection pool closed');
  }
}
