import { filterTextOnly, formatBatchForSummary, type Logger, type Message } from '@chat-digest/history';

import { DEFAULT_BATCH_TOKENS, splitIntoBatchesByTokens } from './batching.js';
import { SummarizeCancelledError, SummarizeError } from './errors.js';
import { buildPrompt } from './prompt.js';
import type { Provider, SummarizeOptions, SummarizeProgress, SummarizeTuning } from './types.js';

export const NO_MESSAGES = 'No messages found in the specified period.';
export const NO_TEXT_MESSAGES = 'No text messages found in the specified period.';

export const DEFAULT_SUMMARIZE_TUNING: SummarizeTuning = {
  batchTokens: DEFAULT_BATCH_TOKENS,
  heartbeatMs: 5000,
  providerTimeoutMs: 10 * 60 * 1000,
};

export type RollingSummarizerOptions = {
  provider: Provider;
  batchTokens?: number;
  heartbeatMs?: number;
  logger?: Logger;
};

/**
 * Folds a chronological message list into one summary: each batch is sent
 * together with the summary of everything before it, and the answer
 * replaces that summary.
 */
export class RollingSummarizer {
  private readonly provider: Provider;
  private readonly batchTokens: number;
  private readonly heartbeatMs: number;
  private readonly logger: Logger;

  constructor(options: RollingSummarizerOptions) {
    this.provider = options.provider;
    this.batchTokens = options.batchTokens ?? DEFAULT_SUMMARIZE_TUNING.batchTokens;
    this.heartbeatMs = options.heartbeatMs ?? DEFAULT_SUMMARIZE_TUNING.heartbeatMs;
    this.logger = options.logger ?? console;
  }

  /** `messages` must already be oldest first. */
  async summarize(goal: string, messages: readonly Message[], options: SummarizeOptions = {}): Promise<string> {
    if (messages.length === 0) return NO_MESSAGES;

    const text = filterTextOnly(messages);
    if (text.length === 0) return NO_TEXT_MESSAGES;

    const batches = splitIntoBatchesByTokens(text, this.batchTokens);
    const total = batches.length;
    const { signal } = options;

    this.logger.debug(`summarize: ${text.length} messages in ${total} batches`);

    let summary = '';
    for (const [i, batch] of batches.entries()) {
      const current = i + 1;
      if (signal?.aborted) throw new SummarizeCancelledError({ batch: current, cause: signal.reason });

      this.report(options.onProgress, current, total, `Processing batch ${current}/${total}`);
      const prompt = buildPrompt({ goal, summary, messages: formatBatchForSummary(batch) });

      let result: string;
      try {
        result = await this.waitForProvider(prompt, current, total, options);
      } catch (cause) {
        if (cause instanceof SummarizeCancelledError) throw cause;
        if (signal?.aborted) throw new SummarizeCancelledError({ batch: current, cause: signal.reason });
        throw new SummarizeError({ batch: current, cause });
      }

      summary = result.trim();
    }

    return summary;
  }

  /**
   * Settles on the provider result or the abort, whichever comes first, and
   * sends a heartbeat every `heartbeatMs` while waiting.
   */
  private waitForProvider(prompt: string, current: number, total: number, options: SummarizeOptions): Promise<string> {
    const { onProgress, signal } = options;

    return new Promise<string>((resolve, reject) => {
      let elapsedMs = 0;
      const timer = setInterval(() => {
        elapsedMs += this.heartbeatMs;
        const seconds = Math.floor(elapsedMs / 1000);
        this.report(onProgress, current, total, `Processing batch ${current}/${total} (${seconds}s elapsed)`);
      }, this.heartbeatMs);

      const onAbort = () => {
        cleanup();
        reject(new SummarizeCancelledError({ batch: current, cause: signal?.reason }));
      };
      const cleanup = () => {
        clearInterval(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      Promise.resolve()
        .then(() => this.provider.summarize(prompt, signal))
        .then(
          result => {
            cleanup();
            resolve(result);
          },
          (err: unknown) => {
            cleanup();
            reject(err);
          },
        );
    });
  }

  private report(onProgress: SummarizeProgress | undefined, current: number, total: number, message: string): void {
    if (!onProgress) return;
    try {
      onProgress(current, total, message);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`summarize: progress callback failed on batch ${current}: ${reason}`);
    }
  }
}
