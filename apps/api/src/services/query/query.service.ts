import type { FastifyBaseLogger } from 'fastify';
import type { QueryFailureResponse, QueryResponse } from '@text2sql/shared-types';
import type { PromptsService } from '../ai/prompts.service.js';
import type { ModelClient, ModelCompletion } from '../ai/gemini.service.js';
import type { LangfuseService } from '../ai/langfuse.service.js';
import type { QueryDatabase } from '../database/index.js';
import { cleanSqlQuery, validateStatement } from '../sql/sql-extractor.js';
import { formatSqlResult } from '../sql/result-formatter.js';

export interface QueryServiceDeps {
  prompts: PromptsService;
  model: ModelClient;
  database: QueryDatabase;
  langfuse: LangfuseService;
  logger: FastifyBaseLogger;
}

const failure = (sql: string | null, error: string): QueryFailureResponse => ({
  success: false,
  result: null,
  sql_query: sql,
  error,
});

export class QueryService {
  constructor(private readonly deps: QueryServiceDeps) {}

  /**
   * Answer a natural-language question (main flow).
   *
   * Validation and execution failures come back as `success: false` with the
   * cleaned SQL attached. Model failures are thrown to the caller.
   */
  async process(question: string): Promise<QueryResponse> {
    const { database, logger } = this.deps;

    // 1. Generate SQL from question
    const rawSql = await this.generateSql(question);

    // 2. Clean and check the model output
    const sql = cleanSqlQuery(rawSql);
    logger.info({ question, sql }, 'SQL generated');

    const validation = validateStatement(sql);
    if (!validation.valid) {
      logger.warn({ rawSql, reason: validation.reason }, 'Rejected model output');
      return failure(sql === '' ? null : sql, `SQL validation error: ${validation.reason}`);
    }

    // 3. Execute SQL query
    const outcome = await database.run(sql);
    if (!outcome.ok) {
      return failure(sql, `SQL execution error: ${outcome.error}`);
    }

    // 4. Format answer
    return {
      success: true,
      result: formatSqlResult(outcome.result, sql),
      sql_query: sql,
      error: null,
    };
  }

  private async generateSql(question: string): Promise<string> {
    const { prompts, model, langfuse } = this.deps;

    const prompt = prompts.buildSqlPrompt(question);

    const trace = langfuse.createTrace('text-to-sql', { question });
    const generation = langfuse.createGeneration(trace, {
      name: 'gemini-sql-generation',
      model: model.modelName,
      input: prompt,
    });

    const startTime = Date.now();
    let completion: ModelCompletion;
    try {
      completion = await model.generate(prompt);
    } catch (error) {
      langfuse.failGeneration(generation, error, Date.now() - startTime);
      await langfuse.flush();
      throw error;
    }
    langfuse.endGeneration(generation, completion.text, completion.usage, Date.now() - startTime);

    await langfuse.flush();

    return completion.text;
  }
}
