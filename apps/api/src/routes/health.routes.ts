import type { FastifyInstance } from 'fastify';
import type { DetailedHealthResponse, HealthResponse, RootResponse } from '@text2sql/shared-types';
import type { Services } from '../services/container.js';

export interface HealthRoutesOptions {
  services: Pick<Services, 'database' | 'model' | 'langfuse'>;
}

export async function healthRoutes(fastify: FastifyInstance, { services }: HealthRoutesOptions) {
  fastify.get('/', async (_request, reply) => {
    const body: RootResponse = { message: 'Text-to-SQL API is running!', status: 'healthy' };
    return reply.send(body);
  });

  // Basic health check
  fastify.get('/health', async (_request, reply) => {
    const body: HealthResponse = {
      status: 'healthy',
      service: 'text-to-sql-api',
      timestamp: new Date().toISOString(),
    };
    return reply.send(body);
  });

  // Detailed health check
  fastify.get('/health/detailed', async (_request, reply) => {
    const [database, model] = await Promise.all([
      services.database.healthCheck(),
      services.model.healthCheck(),
    ]);

    const allHealthy = database && model;
    const body: DetailedHealthResponse = {
      status: allHealthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      checks: { database, model, langfuse: services.langfuse.isActive() },
    };

    return reply.code(allHealthy ? 200 : 503).send(body);
  });
}
