import pino, { type LevelWithSilent, type Logger } from 'pino';
import type { Env } from '../config/env.js';

export const defaultLogLevel = (env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL'>): LevelWithSilent =>
  env.LOG_LEVEL ?? (env.NODE_ENV === 'development' ? 'debug' : 'info');

/**
 * Process-wide pino logger. Fastify is handed the same instance so request
 * logs and service logs share one stream.
 */
export function createLogger(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL'>): Logger {
  return pino({
    level: defaultLogLevel(env),
    transport:
      env.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  });
}
