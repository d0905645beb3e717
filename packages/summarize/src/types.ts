import type { Message } from '@chat-digest/history';

/** A remote text generator that turns one prompt into one completion. */
export type Provider = {
  summarize(prompt: string, signal?: AbortSignal): Promise<string>;
};

export type ProviderName = 'sampling' | 'ollama' | 'gemini' | 'anthropic';

/** Non-empty, chronologically ordered run of text messages. */
export type Batch = readonly Message[];

/** Receives the 1-based batch number, the batch count and a status line. */
export type SummarizeProgress = (current: number, total: number, message: string) => void;

export type SummarizeOptions = {
  onProgress?: SummarizeProgress;
  /** Aborting settles the current wait at once and is passed on to the provider. */
  signal?: AbortSignal;
};

export type SummarizeTuning = {
  /** Approximate token budget of one batch. */
  batchTokens: number;
  /** Interval of the "still working" notification while a provider call is pending. */
  heartbeatMs: number;
  /** Upper bound on one provider request. */
  providerTimeoutMs: number;
};
