import OpenAI from 'openai';

import { ProviderError, ProviderHttpError } from '../errors.js';
import type { Provider } from '../types.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

export type OllamaProviderOptions = {
  model: string;
  /** Server root, without the `/v1` suffix. */
  url?: string;
  timeoutMs?: number;
};

/** Local Ollama server through its OpenAI-compatible API. */
export class OllamaProvider implements Provider {
  readonly model: string;
  readonly baseURL: string;
  private readonly client: OpenAI;

  constructor(options: OllamaProviderOptions) {
    if (!options.model) throw new ProviderError('ollama', 'model is required');
    this.model = options.model;
    this.baseURL = `${(options.url || DEFAULT_OLLAMA_URL).replace(/\/+$/, '')}/v1`;
    this.client = new OpenAI({
      baseURL: this.baseURL,
      apiKey: 'ollama',
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async summarize(prompt: string, signal?: AbortSignal): Promise<string> {
    const completion = await this.client.chat.completions
      .create(
        {
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal },
      )
      .catch((err: unknown) => {
        throw this.wrapError(err);
      });

    const content = completion.choices[0]?.message?.content;
    if (!content) throw new ProviderError('ollama', 'no content in response');
    return content;
  }

  private wrapError(err: unknown): unknown {
    if (err instanceof OpenAI.APIError && err.status !== undefined) {
      return new ProviderHttpError({
        provider: 'ollama',
        status: err.status,
        url: `${this.baseURL}/chat/completions`,
        bodyText: err.message,
        cause: err,
      });
    }
    return err;
  }
}
