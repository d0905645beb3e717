import assert from 'node:assert';

import type { BatchCallback, Logger, ProgressNotification, ProgressSink } from './types.js';

/** Fallback start of the date range when only an end date is given. */
export const PLATFORM_ORIGIN = new Date(Date.UTC(2013, 7, 14));

export const DEFAULT_HEARTBEAT_MS = 5000;

export type ProgressSnapshot = {
  /** Percentage in [0, 100]. */
  progress: number;
  total: 100;
};

export type ProgressEstimatorOptions = {
  from?: Date;
  to?: Date;
  /** 0 or absent = no count limit. */
  countLimit?: number;
  sink?: ProgressSink;
  progressToken?: string | number;
  heartbeatMs?: number;
  now?: () => Date;
  logger?: Logger;
};

type State = 'created' | 'running' | 'stopped';

/**
 * Percentage estimator for long fetches.
 *
 * Date mode (a date filter and no count limit) measures how far back the
 * earliest observed message reaches into the requested range. Count mode
 * measures collected / limit, and stays at 0 when there is no limit.
 *
 * While running, a heartbeat re-sends the last status message so the caller
 * keeps seeing traffic during slow pages.
 */
export class ProgressEstimator {
  readonly mode: 'date' | 'count';

  #state: State = 'created';
  #timer: ReturnType<typeof setInterval> | undefined;
  #earliest: Date | undefined;
  #collected = 0;
  #lastMessage = '';

  readonly #countLimit: number;
  readonly #endMs: number;
  readonly #totalSeconds: number;
  readonly #sink: ProgressSink | undefined;
  readonly #progressToken: string | number | undefined;
  readonly #heartbeatMs: number;
  readonly #logger: Logger;

  constructor(options: ProgressEstimatorOptions = {}) {
    this.#countLimit = options.countLimit ?? 0;
    this.#sink = options.sink;
    this.#progressToken = options.progressToken;
    this.#heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
    this.#logger = options.logger ?? console;

    const hasDateFilter = options.from !== undefined || options.to !== undefined;
    this.mode = hasDateFilter && this.#countLimit === 0 ? 'date' : 'count';

    const end = options.to ?? (options.now ?? (() => new Date()))();
    const start = options.from ?? PLATFORM_ORIGIN;
    this.#endMs = end.getTime();
    this.#totalSeconds = Math.max(1, Math.floor((this.#endMs - start.getTime()) / 1000));
  }

  get state(): State {
    return this.#state;
  }

  start(): void {
    assert(this.#state === 'created', 'progress estimator already started');
    this.#state = 'running';
    this.#timer = setInterval(() => {
      if (this.#lastMessage) this.send(this.#lastMessage);
    }, this.#heartbeatMs);
  }

  stop(): void {
    assert(this.#state === 'running', 'progress estimator is not running');
    this.#state = 'stopped';
    clearInterval(this.#timer);
    this.#timer = undefined;
  }

  setMessage(message: string): void {
    this.#lastMessage = message;
  }

  /** Counts only move forward. */
  setCollected(count: number): void {
    if (count > this.#collected) this.#collected = count;
  }

  /** The earliest timestamp only moves back. */
  observeEarliest(date: Date): void {
    if (!this.#earliest || date < this.#earliest) this.#earliest = date;
  }

  snapshot(): ProgressSnapshot {
    return { progress: this.#percent(), total: 100 };
  }

  /** Batch callback for `fetchAll` that feeds this estimator. */
  trackFetch(): BatchCallback {
    return (page, collected, earliest) => {
      this.setMessage(`Fetching messages (batch ${page}, ${collected} messages so far)...`);
      this.setCollected(collected);
      if (earliest) this.observeEarliest(earliest);
    };
  }

  send(message: string): void {
    if (!this.#sink) return;

    const notification: ProgressNotification = { ...this.snapshot(), message };
    if (this.#progressToken !== undefined) notification.progressToken = this.#progressToken;

    try {
      this.#sink(notification);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.#logger.error(`progress notification failed: ${reason}`);
    }
  }

  #percent(): number {
    if (this.mode === 'date') {
      if (!this.#earliest) return 0;
      const covered = Math.max(0, Math.floor((this.#endMs - this.#earliest.getTime()) / 1000));
      return Math.min(100, (covered * 100) / this.#totalSeconds);
    }

    if (this.#countLimit <= 0) return 0;
    return Math.min(100, (this.#collected * 100) / this.#countLimit);
  }
}
