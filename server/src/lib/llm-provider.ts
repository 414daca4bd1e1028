import { z } from 'zod';
import { extractResponseText, getAnthropicClient } from './anthropic.js';

// ─── Shared interfaces ───────────────────────────────────────────────

export interface ChatParams {
  model: string;
  system: string;
  messages: ChatMessage[];
  max_tokens: number;
  /** Ask the provider for a bare JSON object where it supports that mode. */
  json?: boolean;
  timeout_ms?: number;
  signal?: AbortSignal;
}

export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

export interface ChatResponse {
  text: string;
  usage: { input_tokens: number; output_tokens: number };
}

export interface LLMProvider {
  readonly name: string;
  chat(params: ChatParams): Promise<ChatResponse>;
}

const DEFAULT_TIMEOUT_MS = 180_000;

/**
 * Aborts when the caller's signal fires or after `timeoutMs`, whichever is
 * first. `cleanup` must run once the request settles.
 */
export function createDeadline(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const deadline = new AbortController();
  const timer = setTimeout(() => {
    deadline.abort(new Error(`LLM: request timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timer.unref();

  const signal = callerSignal ? AbortSignal.any([callerSignal, deadline.signal]) : deadline.signal;
  return { signal, cleanup: () => clearTimeout(timer) };
}

// ─── Anthropic provider ──────────────────────────────────────────────

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';

  constructor(private readonly apiKey: string) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    const anthropic = getAnthropicClient(this.apiKey);
    const { signal, cleanup } = createDeadline(params.signal, params.timeout_ms ?? DEFAULT_TIMEOUT_MS);
    try {
      const response = await anthropic.messages.create(
        {
          model: params.model,
          max_tokens: params.max_tokens,
          system: params.system,
          messages: params.messages.map((m) => ({ role: m.role, content: m.content })),
        },
        { signal },
      );

      return {
        text: extractResponseText(response),
        usage: {
          input_tokens: response.usage?.input_tokens ?? 0,
          output_tokens: response.usage?.output_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }
}

// ─── ZAI provider (OpenAI-compatible) ────────────────────────────────

interface ZAIConfig {
  apiKey: string;
  baseUrl: string;
}

const OpenAIChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).nullish(),
      }),
    )
    .default([]),
  usage: z
    .object({
      prompt_tokens: z.number().nullish(),
      completion_tokens: z.number().nullish(),
    })
    .nullish(),
});

export class ZAIProvider implements LLMProvider {
  readonly name = 'zai';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: ZAIConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
  }

  async chat(params: ChatParams): Promise<ChatResponse> {
    const { signal, cleanup } = createDeadline(params.signal, params.timeout_ms ?? DEFAULT_TIMEOUT_MS);
    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(this.buildRequestBody(params)),
        signal,
      });

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw new Error(`LLM: Z.AI request failed with ${response.status}: ${errText.slice(0, 500)}`);
      }

      const parsed = OpenAIChatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('LLM: Z.AI response has an unexpected shape');
      }
      const data = parsed.data;
      return {
        text: data.choices[0]?.message?.content ?? '',
        usage: {
          input_tokens: data.usage?.prompt_tokens ?? 0,
          output_tokens: data.usage?.completion_tokens ?? 0,
        },
      };
    } finally {
      cleanup();
    }
  }

  private buildRequestBody(params: ChatParams): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: params.model,
      max_tokens: params.max_tokens,
      messages: [
        { role: 'system', content: params.system },
        ...params.messages.map((m) => ({ role: m.role, content: m.content })),
      ],
      stream: false,
    };
    if (params.json) {
      body.response_format = { type: 'json_object' };
    }
    return body;
  }
}
