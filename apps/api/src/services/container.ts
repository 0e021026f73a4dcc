import type { FastifyBaseLogger } from 'fastify';
import type { Env } from '../config/env.js';
import { LangfuseService } from './ai/langfuse.service.js';
import { PromptsService } from './ai/prompts.service.js';
import { GeminiService, type ModelClient } from './ai/gemini.service.js';
import { createDatabase, type QueryDatabase } from './database/index.js';
import { QueryService } from './query/query.service.js';

export interface Services {
  langfuse: LangfuseService;
  prompts: PromptsService;
  model: ModelClient;
  database: QueryDatabase;
  query: QueryService;
}

/**
 * Construct every long-lived service once, at startup. Route handlers receive
 * these objects; nothing is created lazily on first request.
 */
export async function createServices(env: Env, logger: FastifyBaseLogger): Promise<Services> {
  const langfuse = new LangfuseService(env, logger);

  const prompts = new PromptsService({ langfuse, logger });
  await prompts.load();

  const model = new GeminiService({
    apiKey: env.GOOGLE_API_KEY,
    model: env.GEMINI_MODEL,
    timeoutMs: env.GEMINI_TIMEOUT_MS,
    logger,
  });

  const database = createDatabase(env, logger);

  const query = new QueryService({ prompts, model, database, langfuse, logger });

  return { langfuse, prompts, model, database, query };
}

export async function closeServices(services: Pick<Services, 'langfuse' | 'database'>): Promise<void> {
  await services.langfuse.shutdown();
  await services.database.close();
}
