import { describe, it, expect, vi } from 'vitest';
import { ProviderHttpError } from '../src/errors.js';
import { OllamaProvider } from '../src/providers/ollama.js';

const sdk = vi.hoisted(() => {
  class APIError extends Error {
    constructor(
      readonly status: number | undefined,
      message: string,
    ) {
      super(message);
    }
  }
  const constructed: unknown[] = [];
  return { create: vi.fn(), constructed, APIError };
});

vi.mock('openai', () => ({
  default: class {
    static APIError = sdk.APIError;
    chat = { completions: { create: sdk.create } };
    constructor(options: unknown) {
      sdk.constructed.push(options);
    }
  },
}));

describe('OllamaProvider', () => {
  it('talks to the OpenAI-compatible endpoint under /v1 without retries', () => {
    new OllamaProvider({ model: 'llama3.2', url: 'http://gpu-box:11434/', timeoutMs: 1000 });

    expect(sdk.constructed.at(-1)).toEqual({
      baseURL: 'http://gpu-box:11434/v1',
      apiKey: 'ollama',
      timeout: 1000,
      maxRetries: 0,
    });
  });

  it('defaults to the local server', () => {
    expect(new OllamaProvider({ model: 'llama3.2' }).baseURL).toBe('http://localhost:11434/v1');
  });

  it('sends the prompt as a single user message and returns the answer', async () => {
    sdk.create.mockResolvedValue({ choices: [{ message: { content: 'local summary' } }] });
    const ac = new AbortController();

    await expect(new OllamaProvider({ model: 'llama3.2' }).summarize('prompt', ac.signal)).resolves.toBe('local summary');

    expect(sdk.create).toHaveBeenCalledWith(
      { model: 'llama3.2', messages: [{ role: 'user', content: 'prompt' }] },
      { signal: ac.signal },
    );
  });

  it('maps API errors to HTTP errors', async () => {
    sdk.create.mockRejectedValue(new sdk.APIError(404, 'model "llama9" not found'));

    const err = await new OllamaProvider({ model: 'llama9' }).summarize('p').catch(e => e);

    expect(err).toBeInstanceOf(ProviderHttpError);
    expect(err.status).toBe(404);
    expect(err.url).toBe('http://localhost:11434/v1/chat/completions');
    expect(err.bodyText).toBe('model "llama9" not found');
  });

  it('passes other failures through', async () => {
    const reason = new sdk.APIError(undefined, 'Request was aborted.');
    sdk.create.mockRejectedValue(reason);

    await expect(new OllamaProvider({ model: 'llama3.2' }).summarize('p')).rejects.toBe(reason);
  });

  it('rejects an empty answer', async () => {
    sdk.create.mockResolvedValue({ choices: [{ message: { content: null } }] });

    await expect(new OllamaProvider({ model: 'llama3.2' }).summarize('p')).rejects.toThrow('ollama: no content in response');
  });

  it('requires a model', () => {
    expect(() => new OllamaProvider({ model: '' })).toThrow('ollama: model is required');
  });
});
