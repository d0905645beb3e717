import type { FetchResult } from './types.js';

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class HistoryError extends Error {
  /** Operation that failed, e.g. `fetch` or `fetchAll`. */
  readonly op: string;

  constructor(op: string, message: string, cause?: unknown) {
    super(cause === undefined ? `${op}: ${message}` : `${op}: ${message}: ${describe(cause)}`, { cause });
    this.name = 'HistoryError';
    this.op = op;
  }
}

export class PeerResolutionError extends HistoryError {
  readonly chatId: number;

  constructor(args: { op: string; chatId: number; cause: unknown }) {
    super(args.op, `resolving peer ${args.chatId}`, args.cause);
    this.name = 'PeerResolutionError';
    this.chatId = args.chatId;
  }
}

/** The platform call failed or answered with a shape we do not understand. */
export class UpstreamError extends HistoryError {
  constructor(args: { op: string; message: string; cause?: unknown }) {
    super(args.op, args.message, args.cause);
    this.name = 'UpstreamError';
  }
}

/** A page failed mid-run. `partial` holds what earlier pages collected. */
export class PaginationError extends HistoryError {
  readonly page: number;
  readonly partial: FetchResult;

  constructor(args: { page: number; partial: FetchResult; cause: unknown }) {
    super('fetchAll', `fetching page ${args.page}`, args.cause);
    this.name = 'PaginationError';
    this.page = args.page;
    this.partial = args.partial;
  }
}

export class FetchCancelledError extends HistoryError {
  readonly partial: FetchResult;

  constructor(args: { partial: FetchResult; cause?: unknown }) {
    super('fetchAll', 'canceled', args.cause);
    this.name = 'FetchCancelledError';
    this.partial = args.partial;
  }
}
