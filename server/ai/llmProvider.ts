/**
 * LLM Provider - Abstraction layer for language-model access
 * OpenAI-compatible chat completions over fetch; any backend implementing
 * LanguageModelBackend can be injected instead (tests use in-process fakes).
 */

import { z } from 'zod';
import { ExtractionFailure } from '../errors';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
  /** Ask the backend for a JSON object response */
  json?: boolean;
}

export interface LanguageModelBackend {
  readonly name: string;
  complete(messages: LLMMessage[], options?: LLMOptions): Promise<string>;
}

export interface OpenAIBackendConfig {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  fetchImpl?: typeof fetch;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
    })
    .optional(),
});

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export class OpenAIBackend implements LanguageModelBackend {
  readonly name = 'openai';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OpenAIBackendConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl || 'https://api.openai.com/v1').replace(/\/+$/, '');
    this.model = config.model || 'gpt-4o-mini';
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async complete(messages: LLMMessage[], options: LLMOptions = {}): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: options.temperature ?? 0,
          max_tokens: options.maxTokens ?? 300,
          ...(options.json ? { response_format: { type: 'json_object' } } : {})
        }),
        signal: options.signal
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new ExtractionFailure('timeout', 'OpenAI request aborted', { cause: error });
      }
      throw new ExtractionFailure('network', 'OpenAI request failed', { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new ExtractionFailure('http', `OpenAI API error ${response.status}: ${errorText.slice(0, 200)}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (isAbortError(error)) {
        throw new ExtractionFailure('timeout', 'OpenAI response aborted', { cause: error });
      }
      throw new ExtractionFailure('malformed', 'OpenAI response was not JSON', { cause: error });
    }

    const parsed = chatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ExtractionFailure('malformed', 'Unexpected OpenAI response shape');
    }

    const content = parsed.data.choices[0].message.content?.trim() ?? '';
    if (!content) {
      throw new ExtractionFailure('empty', 'OpenAI returned an empty completion');
    }

    if (parsed.data.usage) {
      console.log(
        `[LLM] ${this.model} tokens: prompt=${parsed.data.usage.prompt_tokens} completion=${parsed.data.usage.completion_tokens}`
      );
    }
    return content;
  }
}

/**
 * Build the configured backend, or null when no API key is set
 */
export function createBackendFromEnv(source: {
  OPENAI_API_KEY: string;
  OPENAI_BASE_URL: string;
  OPENAI_MODEL: string;
}): LanguageModelBackend | null {
  if (!source.OPENAI_API_KEY) {
    console.warn('[LLM] ⚠️  No OPENAI_API_KEY configured, using keyword extraction only');
    return null;
  }
  return new OpenAIBackend({
    apiKey: source.OPENAI_API_KEY,
    baseUrl: source.OPENAI_BASE_URL || undefined,
    model: source.OPENAI_MODEL
  });
}
