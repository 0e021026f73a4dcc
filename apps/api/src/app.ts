import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { Env } from './config/env.js';
import type { Services } from './services/container.js';
import type { QueryService } from './services/query/query.service.js';
import { healthRoutes } from './routes/health.routes.js';
import { schemaRoutes } from './routes/schema.routes.js';
import { queryRoutes } from './routes/query.routes.js';

export interface AppOptions {
  services: Pick<Services, 'database' | 'model' | 'langfuse' | 'prompts'> & { query: Pick<QueryService, 'process'> };
  env: Pick<Env, 'NODE_ENV'>;
  logger?: FastifyBaseLogger | false;
}

export async function buildApp({ services, env, logger = false }: AppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger });

  // Register CORS
  await fastify.register(cors, {
    origin: env.NODE_ENV === 'production' ? false : true, // Allow all outside production
    credentials: true,
  });

  // Register routes
  await fastify.register(healthRoutes, { services });
  await fastify.register(schemaRoutes, { schemaContext: services.prompts.schemaContext });
  await fastify.register(queryRoutes, { queryService: services.query });

  // Global error handler
  fastify.setErrorHandler((error, _request, reply) => {
    fastify.log.error(error);

    const statusCode = error.statusCode ?? 500;
    const message = statusCode === 500 ? 'Internal Server Error' : error.message;

    reply.code(statusCode).send({
      error: message,
      statusCode,
      ...(env.NODE_ENV === 'development' && { stack: error.stack }),
    });
  });

  return fastify;
}
