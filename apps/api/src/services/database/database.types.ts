export type ExecutionOutcome = { ok: true; result: string } | { ok: false; error: string };

export type SqlDialect = 'sqlite' | 'postgres';

/**
 * A database the query pipeline can run model-generated SQL against.
 * `run` never throws for a failing statement; the error text comes back in
 * the outcome instead.
 */
export interface QueryDatabase {
  readonly dialect: SqlDialect;
  run(sql: string): Promise<ExecutionOutcome>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
