import type { ProviderName } from './types.js';

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class ProviderError extends Error {
  readonly provider: ProviderName;

  constructor(provider: ProviderName, message: string, options?: { cause?: unknown }) {
    super(`${provider}: ${message}`, options);
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

export class ProviderHttpError extends ProviderError {
  readonly status: number;
  readonly url: string;
  readonly bodyText?: string;

  constructor(args: { provider: ProviderName; status: number; url: string; bodyText?: string; cause?: unknown }) {
    super(args.provider, `request failed: ${args.status} ${args.url}`, { cause: args.cause });
    this.name = 'ProviderHttpError';
    this.status = args.status;
    this.url = args.url;
    this.bodyText = args.bodyText;
  }
}

/** A provider call failed. `batch` is 1-based. */
export class SummarizeError extends Error {
  readonly batch: number;

  constructor(args: { batch: number; cause: unknown }) {
    super(`summarizing batch ${args.batch}: ${describe(args.cause)}`, { cause: args.cause });
    this.name = 'SummarizeError';
    this.batch = args.batch;
  }
}

export class SummarizeCancelledError extends Error {
  readonly batch: number;

  constructor(args: { batch: number; cause?: unknown }) {
    super(`summarization canceled at batch ${args.batch}`, { cause: args.cause });
    this.name = 'SummarizeCancelledError';
    this.batch = args.batch;
  }
}
