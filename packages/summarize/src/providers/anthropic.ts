import Anthropic from '@anthropic-ai/sdk';

import { ProviderError, ProviderHttpError } from '../errors.js';
import type { Provider } from '../types.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-haiku-4-5-20251001';
const MAX_TOKENS = 4096;
const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';

export type AnthropicProviderOptions = {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
};

export class AnthropicProvider implements Provider {
  readonly model: string;
  private readonly client: Anthropic;

  constructor(options: AnthropicProviderOptions) {
    if (!options.apiKey) throw new ProviderError('anthropic', 'API key is required');
    this.model = options.model || DEFAULT_ANTHROPIC_MODEL;
    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async summarize(prompt: string, signal?: AbortSignal): Promise<string> {
    const msg = await this.client.messages
      .create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal },
      )
      .catch((err: unknown) => {
        if (err instanceof Anthropic.APIError && err.status !== undefined) {
          throw new ProviderHttpError({
            provider: 'anthropic',
            status: err.status,
            url: ANTHROPIC_MESSAGES_URL,
            bodyText: err.message,
            cause: err,
          });
        }
        throw err;
      });

    if (msg.content.length === 0) throw new ProviderError('anthropic', 'no content in response');
    for (const block of msg.content) {
      if (block.type === 'text') return block.text;
    }
    throw new ProviderError('anthropic', 'no text content in response');
  }
}
