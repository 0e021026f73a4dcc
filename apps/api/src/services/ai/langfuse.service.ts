import { Langfuse, type LangfuseTraceClient, type LangfuseGenerationClient } from 'langfuse';
import type { FastifyBaseLogger } from 'fastify';
import type { Env } from '../../config/env.js';
import type { ModelUsage } from './gemini.service.js';
import { errorMessage } from '../../utils/errors.js';

type LangfuseEnv = Pick<Env, 'LANGFUSE_PUBLIC_KEY' | 'LANGFUSE_SECRET_KEY' | 'LANGFUSE_HOST'>;

export class LangfuseService {
  private langfuse: Langfuse | null = null;
  private logger: FastifyBaseLogger;

  constructor(env: LangfuseEnv, logger: FastifyBaseLogger) {
    this.logger = logger;

    if (env.LANGFUSE_PUBLIC_KEY && env.LANGFUSE_SECRET_KEY) {
      this.langfuse = new Langfuse({
        publicKey: env.LANGFUSE_PUBLIC_KEY,
        secretKey: env.LANGFUSE_SECRET_KEY,
        baseUrl: env.LANGFUSE_HOST,
        flushAt: 1,
        flushInterval: 1000,
      });

      this.logger.info('Langfuse tracing enabled');
    } else {
      this.logger.info('Langfuse not configured - using local prompts, no tracing');
    }
  }

  /**
   * Get a managed text prompt from Langfuse.
   * Returns null if Langfuse is not available or the prompt cannot be fetched.
   */
  async getPrompt(name: string): Promise<string | null> {
    if (!this.langfuse) {
      return null;
    }

    try {
      const prompt = await this.langfuse.getPrompt(name);
      return prompt.prompt;
    } catch (error) {
      this.logger.warn({ err: error }, `Failed to fetch prompt "${name}" from Langfuse`);
      return null;
    }
  }

  /**
   * Create a trace for tracking AI operations
   */
  createTrace(name: string, metadata?: Record<string, unknown>): LangfuseTraceClient | null {
    if (!this.langfuse) {
      return null;
    }

    return this.langfuse.trace({
      name,
      metadata,
      timestamp: new Date(),
    });
  }

  /**
   * Create a generation within a trace
   */
  createGeneration(
    trace: LangfuseTraceClient | null,
    config: {
      name: string;
      model: string;
      input: unknown;
      metadata?: Record<string, unknown>;
    }
  ): LangfuseGenerationClient | null {
    if (!trace) {
      return null;
    }

    return trace.generation({
      name: config.name,
      model: config.model,
      input: config.input,
      metadata: config.metadata,
    });
  }

  /**
   * End a generation with output and usage stats
   */
  endGeneration(
    generation: LangfuseGenerationClient | null,
    output: unknown,
    usage: ModelUsage,
    latencyMs: number
  ): void {
    if (!generation) {
      return;
    }

    generation.end({
      output,
      usage: {
        promptTokens: usage.promptTokens,
        completionTokens: usage.completionTokens,
        totalTokens: usage.totalTokens,
      },
      metadata: { latencyMs },
    });
  }

  /**
   * End a generation whose model call failed
   */
  failGeneration(generation: LangfuseGenerationClient | null, error: unknown, latencyMs: number): void {
    if (!generation) {
      return;
    }

    generation.end({
      level: 'ERROR',
      statusMessage: errorMessage(error),
      metadata: { latencyMs },
    });
  }

  /**
   * Flush all pending events to Langfuse
   */
  async flush(): Promise<void> {
    if (!this.langfuse) {
      return;
    }

    await this.langfuse.flushAsync();
  }

  async shutdown(): Promise<void> {
    if (!this.langfuse) {
      return;
    }

    await this.langfuse.shutdownAsync();
  }

  isActive(): boolean {
    return this.langfuse !== null;
  }
}
