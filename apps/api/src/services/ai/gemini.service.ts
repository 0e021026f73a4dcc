import { GoogleGenerativeAI, type Content, type GenerativeModel } from '@google/generative-ai';
import type { FastifyBaseLogger } from 'fastify';
import type { PromptMessage } from './prompts.service.js';
import { ModelCallError, errorMessage } from '../../utils/errors.js';

export interface ModelUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ModelCompletion {
  text: string;
  usage: ModelUsage;
}

/**
 * Text-generation backend used by the query pipeline.
 */
export interface ModelClient {
  readonly modelName: string;
  generate(prompt: PromptMessage[]): Promise<ModelCompletion>;
  healthCheck(): Promise<boolean>;
}

export interface GeminiServiceOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
  logger: FastifyBaseLogger;
}

export class GeminiService implements ModelClient {
  readonly modelName: string;
  private genAI: GoogleGenerativeAI;
  private timeoutMs: number;
  private logger: FastifyBaseLogger;
  private models: Map<string, GenerativeModel> = new Map();

  constructor({ apiKey, model, timeoutMs, logger }: GeminiServiceOptions) {
    this.genAI = new GoogleGenerativeAI(apiKey);
    this.modelName = model;
    this.timeoutMs = timeoutMs;
    this.logger = logger;
  }

  // One model handle per system instruction; the SQL prompt always uses the same one.
  private getModel(systemInstruction: string): GenerativeModel {
    let model = this.models.get(systemInstruction);
    if (!model) {
      model = this.genAI.getGenerativeModel(
        {
          model: this.modelName,
          generationConfig: { temperature: 0 },
          ...(systemInstruction ? { systemInstruction } : {}),
        },
        { timeout: this.timeoutMs }
      );
      this.models.set(systemInstruction, model);
    }
    return model;
  }

  /**
   * Submit a role-tagged prompt and return the raw completion text.
   * System messages become the system instruction; `human` and `ai` turns map
   * to Gemini's `user` and `model` roles.
   */
  async generate(prompt: PromptMessage[]): Promise<ModelCompletion> {
    const systemInstruction = prompt
      .filter((message) => message.role === 'system')
      .map((message) => message.content)
      .join('\n\n');

    const contents: Content[] = prompt
      .filter((message) => message.role !== 'system')
      .map((message) => ({
        role: message.role === 'ai' ? 'model' : 'user',
        parts: [{ text: message.content }],
      }));

    let text: string;
    let usage: ModelUsage;
    try {
      const result = await this.getModel(systemInstruction).generateContent({ contents });
      const response = result.response;
      text = response.text();
      usage = {
        promptTokens: response.usageMetadata?.promptTokenCount ?? 0,
        completionTokens: response.usageMetadata?.candidatesTokenCount ?? 0,
        totalTokens: response.usageMetadata?.totalTokenCount ?? 0,
      };
    } catch (error) {
      this.logger.error({ err: error }, 'Gemini request failed');
      throw new ModelCallError(`Gemini request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (text.trim() === '') {
      throw new ModelCallError('Gemini returned an empty completion');
    }

    this.logger.debug({ usage }, 'Gemini completion received');
    return { text, usage };
  }

  /**
   * Health check for Gemini API
   */
  async healthCheck(): Promise<boolean> {
    try {
      const { text } = await this.generate([{ role: 'human', content: 'Respond with the single word OK' }]);
      return text.trim().toUpperCase().startsWith('OK');
    } catch (error) {
      this.logger.error({ err: error }, 'Gemini health check failed');
      return false;
    }
  }
}
