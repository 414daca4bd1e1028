import { z } from 'zod';
import { getConfig, type AppConfig } from './config.js';
import { repairJSON } from './json-repair.js';
import { createProvider } from './llm.js';
import type { LLMProvider } from './llm-provider.js';
import logger from './logger.js';

export interface InferenceRequest<T extends z.ZodType> {
  /** Short label used in logs and error messages, e.g. `structured_extraction`. */
  task: string;
  instructions: string;
  input: string | object;
  schema: T;
  model?: string;
  signal?: AbortSignal;
}

export interface InferenceClientOptions {
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

function formatInput(input: string | object): string {
  return typeof input === 'string' ? input : JSON.stringify(input, null, 2);
}

function buildSystemPrompt(instructions: string, jsonSchema: unknown): string {
  return [
    instructions.trim(),
    '',
    'Respond with a single JSON object that conforms to this JSON Schema.',
    'Do not wrap it in markdown and do not add commentary before or after it.',
    'Use null for values the input does not contain and [] for empty lists.',
    '',
    JSON.stringify(jsonSchema),
  ].join('\n');
}

export function formatIssues(issues: z.ZodError['issues']): string {
  return issues
    .slice(0, 5)
    .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Schema-constrained calls to the configured model. Every response is repaired,
 * parsed and validated before it is returned; anything else throws.
 */
export class InferenceClient {
  constructor(
    private readonly provider: LLMProvider,
    private readonly options: InferenceClientOptions,
  ) {}

  get providerName(): string {
    return this.provider.name;
  }

  async generate<T extends z.ZodType>(request: InferenceRequest<T>): Promise<z.output<T>> {
    const { task, schema } = request;
    const system = buildSystemPrompt(request.instructions, z.toJSONSchema(schema));
    const start = Date.now();

    const response = await this.provider.chat({
      model: request.model ?? this.options.model,
      max_tokens: this.options.maxTokens,
      system,
      messages: [{ role: 'user', content: formatInput(request.input) }],
      json: true,
      timeout_ms: this.options.timeoutMs,
      signal: request.signal,
    });

    logger.debug(
      { task, provider: this.provider.name, durationMs: Date.now() - start, usage: response.usage },
      'Inference: response received',
    );

    if (!response.text.trim()) {
      throw new Error(`Inference: empty response for ${task}`);
    }

    const candidate = repairJSON(response.text);
    if (candidate === null) {
      throw new Error(`Inference: ${task} response is not valid JSON`);
    }

    const result = schema.safeParse(candidate);
    if (!result.success) {
      throw new Error(`Inference: ${task} response failed validation (${formatIssues(result.error.issues)})`);
    }
    return result.data;
  }
}

/**
 * Builds the process-wide client from configuration, or null when no provider
 * credentials are configured. Callers treat null as "service unavailable".
 */
export function createInferenceClient(config: AppConfig = getConfig()): InferenceClient | null {
  const selection = createProvider(config.llm);
  if (!selection) return null;
  return new InferenceClient(selection.provider, {
    model: selection.model,
    maxTokens: selection.maxTokens,
    timeoutMs: config.inferenceTimeoutMs,
  });
}
