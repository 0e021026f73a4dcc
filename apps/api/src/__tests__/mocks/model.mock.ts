import { vi } from 'vitest';
import type { ModelClient, ModelCompletion } from '../../services/ai/gemini.service.js';
import type { PromptMessage } from '../../services/ai/prompts.service.js';

export const completion = (text: string): ModelCompletion => ({
  text,
  usage: { promptTokens: 100, completionTokens: 20, totalTokens: 120 },
});

/**
 * Stand-in for the Gemini client. Every call answers with `text` unless a
 * test overrides `generate`.
 */
export const createMockModelClient = (text = 'SELECT 1;') => {
  const generate = vi
    .fn<(prompt: PromptMessage[]) => Promise<ModelCompletion>>()
    .mockResolvedValue(completion(text));
  const healthCheck = vi.fn<() => Promise<boolean>>().mockResolvedValue(true);

  const client: ModelClient = { modelName: 'gemini-test', generate, healthCheck };
  return { client, generate, healthCheck };
};
