import { z } from 'zod';
import { LlmNotConfiguredError, LlmRequestError } from './errors.js';
import type { LlmConfig } from '../config/types.js';
import { toError } from '../utils/fs.js';

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface CompleteOptions {
  system?: string;
}

export interface LlmClient {
  /**
   * @throws {LlmNotConfiguredError} без endpoint или ключа
   * @throws {LlmRequestError} при ошибке HTTP или пустом ответе
   */
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

export type FetchFn = typeof fetch;

export type Env = Record<string, string | undefined>;

const completionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
    }),
  ),
});

class LlmClientImpl implements LlmClient {
  constructor(
    private readonly config: LlmConfig,
    private readonly env: Env,
    private readonly fetchFn: FetchFn,
  ) {}

  async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    const { endpoint, apiKeyEnv } = this.config;
    if (!endpoint) {
      throw new LlmNotConfiguredError(
        'LLM endpoint is not configured. Set llm.endpoint in prompt-manager.config.yml',
      );
    }
    const apiKey = this.env[apiKeyEnv];
    if (!apiKey) {
      throw new LlmNotConfiguredError(`LLM API key is not set. Export ${apiKeyEnv}`);
    }

    const messages: ChatMessage[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    let response: Response;
    try {
      response = await this.fetchFn(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${apiKey}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          messages,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (e) {
      throw new LlmRequestError(`LLM request failed: ${toError(e).message}`, undefined, toError(e));
    }

    if (!response.ok) {
      throw new LlmRequestError(
        `LLM API error: ${response.status} ${response.statusText}`.trim(),
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (e) {
      throw new LlmRequestError('LLM API returned invalid JSON', response.status, toError(e));
    }

    const parsed = completionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new LlmRequestError('LLM API returned an unexpected response', response.status, parsed.error);
    }
    const [first] = parsed.data.choices;
    if (!first) {
      throw new LlmRequestError('LLM API returned no choices', response.status);
    }
    return first.message.content ?? '';
  }
}

export function createLlmClient(
  config: LlmConfig,
  env: Env = process.env,
  fetchFn: FetchFn = fetch,
): LlmClient {
  return new LlmClientImpl(config, env, fetchFn);
}
