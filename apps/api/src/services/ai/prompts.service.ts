import { readFile } from 'fs/promises';
import { join } from 'path';
import type { FastifyBaseLogger } from 'fastify';
import type { LangfuseService } from './langfuse.service.js';
import { rootDir } from '../../config/env.js';
import { getSchemaContext } from '../../config/schema-context.js';
import { FEW_SHOT_EXAMPLES, type FewShotExample } from '../../config/few-shot-examples.js';

export const PROMPTS_DIR = join(rootDir, 'prompts/fallback');
export const SQL_PROMPT_NAME = 'sql-generator';

export type PromptRole = 'system' | 'human' | 'ai';

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

export interface PromptTemplate {
  system: string;
  user: string;
}

/**
 * Parse the "SYSTEM INSTRUCTION:\n...\n---\nUSER PROMPT:\n..." layout shared by
 * the local fallback files and Langfuse-managed prompts.
 */
export function parsePromptTemplate(content: string, name: string): PromptTemplate {
  const parts = content.split('---');
  if (parts.length !== 2) {
    throw new Error(`Invalid prompt format in ${name}`);
  }

  const system = parts[0].split('USER PROMPT:')[0].replace('SYSTEM INSTRUCTION:', '').trim();
  const user = parts[1].replace('USER PROMPT:', '').trim();

  return { system, user };
}

/**
 * Compile prompt template with variables
 */
export function compileTemplate(template: string, variables: Record<string, string>): string {
  let compiled = template;
  for (const [key, value] of Object.entries(variables)) {
    // Replacer function: values are inserted literally, `$&` and friends included.
    compiled = compiled.replaceAll(`{{${key}}}`, () => value);
  }
  return compiled;
}

/**
 * Build the SQL-generation prompt: system preamble, then each few-shot
 * example as a human/ai pair, then the user's question.
 */
export function buildSqlPrompt(
  template: PromptTemplate,
  schemaContext: string,
  examples: readonly FewShotExample[],
  question: string
): PromptMessage[] {
  const messages: PromptMessage[] = [
    { role: 'system', content: compileTemplate(template.system, { schemaContext }) },
  ];

  for (const example of examples) {
    messages.push({ role: 'human', content: compileTemplate(template.user, { userQuestion: example.question }) });
    messages.push({ role: 'ai', content: example.query });
  }

  messages.push({ role: 'human', content: compileTemplate(template.user, { userQuestion: question }) });

  return messages;
}

export interface PromptsServiceOptions {
  langfuse: LangfuseService;
  logger: FastifyBaseLogger;
  promptsDir?: string;
  schemaContext?: string;
  examples?: readonly FewShotExample[];
}

export class PromptsService {
  private template: PromptTemplate | null = null;
  private langfuse: LangfuseService;
  private logger: FastifyBaseLogger;
  private promptsDir: string;
  readonly schemaContext: string;
  readonly examples: readonly FewShotExample[];

  constructor(options: PromptsServiceOptions) {
    this.langfuse = options.langfuse;
    this.logger = options.logger;
    this.promptsDir = options.promptsDir ?? PROMPTS_DIR;
    this.schemaContext = options.schemaContext ?? getSchemaContext();
    this.examples = options.examples ?? FEW_SHOT_EXAMPLES;
  }

  /**
   * Load the SQL prompt template from Langfuse or the local fallback file.
   * Called once at startup; prompt building afterwards does no I/O.
   */
  async load(): Promise<PromptTemplate> {
    const managed = await this.langfuse.getPrompt(SQL_PROMPT_NAME);
    if (managed) {
      try {
        this.template = parsePromptTemplate(managed, SQL_PROMPT_NAME);
        this.logger.info(`Loaded prompt "${SQL_PROMPT_NAME}" from Langfuse`);
        return this.template;
      } catch (error) {
        this.logger.warn({ err: error }, `Langfuse prompt "${SQL_PROMPT_NAME}" is malformed, falling back to local`);
      }
    }

    const filePath = join(this.promptsDir, `${SQL_PROMPT_NAME}.txt`);
    const content = await readFile(filePath, 'utf-8');
    this.template = parsePromptTemplate(content, `${SQL_PROMPT_NAME}.txt`);
    this.logger.info(`Loaded prompt "${SQL_PROMPT_NAME}" from local fallback`);
    return this.template;
  }

  buildSqlPrompt(question: string): PromptMessage[] {
    if (!this.template) {
      throw new Error('Prompt template not loaded; call load() first');
    }
    return buildSqlPrompt(this.template, this.schemaContext, this.examples, question);
  }
}
