import type { Logger } from '@chat-digest/history';

import { ProviderError } from '../errors.js';
import type { Provider, ProviderName } from '../types.js';
import { AnthropicProvider } from './anthropic.js';
import { GeminiProvider } from './gemini.js';
import { OllamaProvider } from './ollama.js';
import { SamplingProvider, type SamplingChannel } from './sampling.js';

export const PROVIDER_NAMES: readonly ProviderName[] = ['sampling', 'ollama', 'gemini', 'anthropic'];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some(name => name === value);
}

export type ProviderConfig = {
  provider: ProviderName;
  /** Provider-specific; required for ollama. */
  model?: string;
  ollamaUrl?: string;
  geminiApiKey?: string;
  anthropicApiKey?: string;
  timeoutMs?: number;
};

export type ProviderDeps = {
  /** Required for the sampling provider. */
  channel?: SamplingChannel;
  fetch?: typeof fetch;
  logger?: Logger;
};

export function createProvider(config: ProviderConfig, deps: ProviderDeps = {}): Provider {
  const logger = deps.logger ?? console;
  logger.info(`summarize: using provider ${config.provider}${config.model ? ` (${config.model})` : ''}`);

  switch (config.provider) {
    case 'sampling':
      if (!deps.channel) throw new ProviderError('sampling', 'no host model channel available');
      return new SamplingProvider(deps.channel);
    case 'ollama':
      return new OllamaProvider({ model: config.model ?? '', url: config.ollamaUrl, timeoutMs: config.timeoutMs });
    case 'gemini':
      return new GeminiProvider({
        apiKey: config.geminiApiKey ?? '',
        model: config.model,
        timeoutMs: config.timeoutMs,
        fetch: deps.fetch,
      });
    case 'anthropic':
      return new AnthropicProvider({ apiKey: config.anthropicApiKey ?? '', model: config.model, timeoutMs: config.timeoutMs });
  }
}

export { AnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from './anthropic.js';
export type { AnthropicProviderOptions } from './anthropic.js';
export { DEFAULT_GEMINI_MODEL, extractGeminiText, GEMINI_BASE_URL, GeminiProvider } from './gemini.js';
export type { GeminiProviderOptions } from './gemini.js';
export { DEFAULT_OLLAMA_URL, OllamaProvider } from './ollama.js';
export type { OllamaProviderOptions } from './ollama.js';
export { SAMPLING_MAX_TOKENS, SamplingProvider } from './sampling.js';
export type { SamplingChannel, SamplingMessage, SamplingRequest, SamplingResult, SamplingTextContent } from './sampling.js';
