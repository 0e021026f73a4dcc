import type { FastifyInstance } from 'fastify';
import { parseEnv } from './config/env.js';
import { createLogger } from './utils/logger.js';
import { closeServices, createServices } from './services/container.js';
import { buildApp } from './app.js';

/**
 * Validate configuration, construct services and start listening.
 * Rejects with a ConfigurationError before anything is constructed when the
 * environment is invalid.
 */
export async function start(source: NodeJS.ProcessEnv = process.env): Promise<FastifyInstance> {
  const env = parseEnv(source);
  const logger = createLogger(env);

  const services = await createServices(env, logger);
  const fastify = await buildApp({ services, env, logger });

  // Graceful shutdown
  const gracefulShutdown = async () => {
    fastify.log.info('Shutting down gracefully...');

    try {
      await fastify.close();
      await closeServices(services);
      fastify.log.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      fastify.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void gracefulShutdown());
  process.once('SIGINT', () => void gracefulShutdown());

  await fastify.listen({
    port: env.API_PORT,
    host: env.API_HOST,
  });

  fastify.log.info(`🚀 API Server running at http://${env.API_HOST}:${env.API_PORT}`);
  fastify.log.info(`📊 Health check: http://${env.API_HOST}:${env.API_PORT}/health`);
  fastify.log.info(`🔥 Gemini Model: ${env.GEMINI_MODEL}`);
  fastify.log.info(`🗄️  Database: ${services.database.dialect}${env.SQL_READ_ONLY ? ' (read-only)' : ''}`);
  fastify.log.info(`📡 Langfuse: ${services.langfuse.isActive() ? 'Enabled' : 'Disabled (using local prompts)'}`);

  return fastify;
}
