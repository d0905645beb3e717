import { ProviderError, ProviderHttpError } from '../errors.js';
import type { Provider } from '../types.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export type GeminiProviderOptions = {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
};

type GeminiRequest = {
  contents: Array<{ parts: Array<{ text: string }> }>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Pulls the first text part out of a generateContent response. */
export function extractGeminiText(payload: unknown): string {
  if (!isRecord(payload)) throw new ProviderError('gemini', 'malformed response');

  if (isRecord(payload.error)) {
    const { message, code } = payload.error;
    throw new ProviderError('gemini', `error: ${String(message)} (code: ${String(code)})`);
  }

  const candidates = payload.candidates;
  if (!Array.isArray(candidates) || candidates.length === 0) {
    throw new ProviderError('gemini', 'no candidates in response');
  }

  const first: unknown = candidates[0];
  const content = isRecord(first) && isRecord(first.content) ? first.content : undefined;
  const parts: unknown[] = content && Array.isArray(content.parts) ? content.parts : [];
  if (parts.length === 0) throw new ProviderError('gemini', 'no parts in response content');

  const part: unknown = parts[0];
  if (!isRecord(part) || typeof part.text !== 'string') {
    throw new ProviderError('gemini', 'no text in response content');
  }
  return part.text;
}

async function safeReadText(res: Response) {
  try {
    return await res.text();
  } catch {
    return undefined;
  }
}

export class GeminiProvider implements Provider {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly fetchFn: typeof fetch;

  constructor(options: GeminiProviderOptions) {
    if (!options.apiKey) throw new ProviderError('gemini', 'API key is required');
    this.apiKey = options.apiKey;
    this.model = options.model || DEFAULT_GEMINI_MODEL;
    this.baseUrl = (options.baseUrl ?? GEMINI_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetch ?? fetch;
  }

  async summarize(prompt: string, signal?: AbortSignal): Promise<string> {
    const url = `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`;
    const body: GeminiRequest = { contents: [{ parts: [{ text: prompt }] }] };

    const ac = new AbortController();
    const onAbort = () => ac.abort(signal?.reason);
    if (signal?.aborted) onAbort();
    else signal?.addEventListener('abort', onAbort, { once: true });

    const timeout = this.timeoutMs
      ? setTimeout(() => ac.abort(new ProviderError('gemini', `request timed out after ${this.timeoutMs}ms`)), this.timeoutMs)
      : undefined;

    try {
      const res = await this.fetchFn(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey,
        },
        body: JSON.stringify(body),
        signal: ac.signal,
      });

      if (!res.ok) {
        const bodyText = await safeReadText(res);
        throw new ProviderHttpError({ provider: 'gemini', status: res.status, url, bodyText });
      }

      let payload: unknown;
      try {
        payload = await res.json();
      } catch (cause) {
        throw new ProviderError('gemini', 'malformed response', { cause });
      }
      return extractGeminiText(payload);
    } finally {
      if (timeout) clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
