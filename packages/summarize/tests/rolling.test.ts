import { afterEach, describe, it, expect, vi } from 'vitest';
import { SummarizeCancelledError, SummarizeError } from '../src/errors.js';
import { NO_MESSAGES, NO_TEXT_MESSAGES, RollingSummarizer } from '../src/rolling.js';
import type { Provider, SummarizeProgress } from '../src/types.js';
import { msg, silentLogger, TEN_TOKENS } from './helpers.js';

function fakeProvider() {
  return { summarize: vi.fn<Provider['summarize']>() };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('RollingSummarizer', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('answers without a provider call when there are no messages', async () => {
    const provider = fakeProvider();
    const summarizer = new RollingSummarizer({ provider, logger: silentLogger() });

    await expect(summarizer.summarize('goal', [])).resolves.toBe(NO_MESSAGES);
    expect(NO_MESSAGES).toBe('No messages found in the specified period.');
    expect(provider.summarize).not.toHaveBeenCalled();
  });

  it('answers without a provider call when no message has text', async () => {
    const provider = fakeProvider();
    const summarizer = new RollingSummarizer({ provider, logger: silentLogger() });
    const mediaOnly = [msg(1, '', { media: { type: 'photo' } }), msg(2, '')];

    await expect(summarizer.summarize('goal', mediaOnly)).resolves.toBe(NO_TEXT_MESSAGES);
    expect(NO_TEXT_MESSAGES).toBe('No text messages found in the specified period.');
    expect(provider.summarize).not.toHaveBeenCalled();
  });

  it('feeds each answer into the next prompt and returns the last one trimmed', async () => {
    const provider = fakeProvider();
    provider.summarize.mockResolvedValueOnce('  summary one \n').mockResolvedValueOnce('summary two\n');
    const onProgress = vi.fn<SummarizeProgress>();
    const summarizer = new RollingSummarizer({ provider, batchTokens: 10, logger: silentLogger() });

    const messages = [msg(1, TEN_TOKENS), msg(2, TEN_TOKENS, { senderId: 2 })];
    const result = await summarizer.summarize('track decisions', messages, { onProgress });

    expect(result).toBe('summary two');
    expect(provider.summarize).toHaveBeenCalledTimes(2);

    const [firstPrompt] = provider.summarize.mock.calls[0];
    const [secondPrompt] = provider.summarize.mock.calls[1];
    expect(firstPrompt).toContain('track decisions');
    expect(firstPrompt).toContain('Current summary so far:\n\n\nNew messages to incorporate:');
    expect(firstPrompt).toContain(`[2024-01-15 10:30] 1: ${TEN_TOKENS}\n`);
    expect(firstPrompt).not.toContain(`] 2: ${TEN_TOKENS}`);
    expect(secondPrompt).toContain('Current summary so far:\nsummary one\n');
    expect(secondPrompt).toContain(`[2024-01-15 10:30] 2: ${TEN_TOKENS}\n`);
    expect(secondPrompt).not.toContain(`] 1: ${TEN_TOKENS}`);

    expect(onProgress.mock.calls).toEqual([
      [1, 2, 'Processing batch 1/2'],
      [2, 2, 'Processing batch 2/2'],
    ]);
  });

  it('skips messages without text when building batches', async () => {
    const provider = fakeProvider();
    provider.summarize.mockResolvedValue('ok');
    const summarizer = new RollingSummarizer({ provider, logger: silentLogger() });

    await summarizer.summarize('g', [msg(1, 'first'), msg(2, ''), msg(3, 'third')]);

    const [prompt] = provider.summarize.mock.calls[0];
    expect(prompt).toContain('[2024-01-15 10:30] 1: first\n[2024-01-15 10:30] 1: third\n');
  });

  it('reports the failing batch', async () => {
    const provider = fakeProvider();
    provider.summarize.mockResolvedValueOnce('one').mockRejectedValueOnce(new Error('boom'));
    const summarizer = new RollingSummarizer({ provider, batchTokens: 10, logger: silentLogger() });

    const err = await summarizer.summarize('g', [msg(1, TEN_TOKENS), msg(2, TEN_TOKENS), msg(3, TEN_TOKENS)]).catch(e => e);

    expect(err).toBeInstanceOf(SummarizeError);
    expect(err.batch).toBe(2);
    expect(err.message).toBe('summarizing batch 2: boom');
    expect(provider.summarize).toHaveBeenCalledTimes(2);
  });

  it('sends a heartbeat while the provider is working', async () => {
    vi.useFakeTimers();
    const provider = fakeProvider();
    const answer = deferred<string>();
    provider.summarize.mockReturnValue(answer.promise);
    const onProgress = vi.fn<SummarizeProgress>();
    const summarizer = new RollingSummarizer({ provider, heartbeatMs: 5000, logger: silentLogger() });

    const pending = summarizer.summarize('g', [msg(1, 'hello')], { onProgress });
    await vi.advanceTimersByTimeAsync(12_000);
    answer.resolve('done');

    await expect(pending).resolves.toBe('done');
    expect(onProgress.mock.calls).toEqual([
      [1, 1, 'Processing batch 1/1'],
      [1, 1, 'Processing batch 1/1 (5s elapsed)'],
      [1, 1, 'Processing batch 1/1 (10s elapsed)'],
    ]);

    await vi.advanceTimersByTimeAsync(20_000);
    expect(onProgress).toHaveBeenCalledTimes(3);
  });

  it('stops waiting on abort and hands the signal to the provider', async () => {
    const provider = fakeProvider();
    provider.summarize.mockReturnValue(new Promise<string>(() => {}));
    const summarizer = new RollingSummarizer({ provider, logger: silentLogger() });
    const ac = new AbortController();

    const pending = summarizer.summarize('g', [msg(1, 'hello')], { signal: ac.signal });
    await vi.waitFor(() => expect(provider.summarize).toHaveBeenCalled());
    ac.abort();

    const err = await pending.catch(e => e);
    expect(err).toBeInstanceOf(SummarizeCancelledError);
    expect(err.batch).toBe(1);

    const [, signal] = provider.summarize.mock.calls[0];
    expect(signal).toBe(ac.signal);
    expect(signal?.aborted).toBe(true);
  });

  it('does not call the provider when already aborted', async () => {
    const provider = fakeProvider();
    const summarizer = new RollingSummarizer({ provider, logger: silentLogger() });
    const ac = new AbortController();
    ac.abort();

    await expect(summarizer.summarize('g', [msg(1, 'hello')], { signal: ac.signal })).rejects.toBeInstanceOf(
      SummarizeCancelledError,
    );
    expect(provider.summarize).not.toHaveBeenCalled();
  });

  it('survives a throwing progress callback', async () => {
    const provider = fakeProvider();
    provider.summarize.mockResolvedValue('fine');
    const logger = silentLogger();
    const summarizer = new RollingSummarizer({ provider, logger });

    const result = await summarizer.summarize('g', [msg(1, 'hello')], {
      onProgress: () => {
        throw new Error('sink closed');
      },
    });

    expect(result).toBe('fine');
    expect(logger.error).toHaveBeenCalledWith('summarize: progress callback failed on batch 1: sink closed');
  });
});
