import { ProviderError } from '../errors.js';
import type { Provider } from '../types.js';

export const SAMPLING_MAX_TOKENS = 2000;

export type SamplingTextContent = { type: 'text'; text: string };

export type SamplingMessage = {
  role: 'user' | 'assistant';
  content: SamplingTextContent;
};

export type SamplingRequest = {
  messages: SamplingMessage[];
  maxTokens: number;
};

export type SamplingResult = {
  model?: string;
  content: SamplingTextContent | { type: 'image' | 'audio'; data: string; mimeType: string } | string;
};

/**
 * The host's model channel: the connected client runs the completion with
 * whatever model it has and sends the answer back.
 */
export type SamplingChannel = {
  createMessage(request: SamplingRequest, options?: { signal?: AbortSignal }): Promise<SamplingResult>;
};

export class SamplingProvider implements Provider {
  constructor(private readonly channel: SamplingChannel) {}

  async summarize(prompt: string, signal?: AbortSignal): Promise<string> {
    let result: SamplingResult;
    try {
      result = await this.channel.createMessage(
        {
          messages: [{ role: 'user', content: { type: 'text', text: prompt } }],
          maxTokens: SAMPLING_MAX_TOKENS,
        },
        { signal },
      );
    } catch (cause) {
      if (signal?.aborted) throw cause;
      throw new ProviderError('sampling', `requesting sampling: ${cause instanceof Error ? cause.message : String(cause)}`, {
        cause,
      });
    }

    const { content } = result;
    if (typeof content === 'string') return content;
    if (content.type === 'text') return content.text;
    throw new ProviderError('sampling', `unsupported content type: ${content.type}`);
  }
}
