import { setTimeout as delay } from 'node:timers/promises';

export type RateLimiterOptions = {
  /** Permits per second. Default: 1. */
  perSecond?: number;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

const defaultSleep = (ms: number, signal?: AbortSignal) => delay(ms, undefined, { signal });

/**
 * Fixed-rate limiter for outbound platform calls. Permits are handed out
 * FIFO and spaced at least `1000 / perSecond` ms apart; the first permit is
 * immediate. It throttles only, it never backs off on errors.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private nextAvailableMs: number | undefined;
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions = {}) {
    const perSecond = options.perSecond ?? 1;
    if (!Number.isFinite(perSecond) || perSecond <= 0) {
      throw new RangeError(`perSecond must be a positive finite number; got ${perSecond}`);
    }
    this.intervalMs = 1000 / perSecond;
    this.now = options.now ?? (() => performance.now());
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Resolves when the caller may issue one request. Rejects if `signal` aborts while waiting. */
  take(signal?: AbortSignal): Promise<void> {
    const wait = this.tail.then(async () => {
      signal?.throwIfAborted();
      const now = this.now();
      const previous = this.nextAvailableMs;
      const scheduledAt = Math.max(now, previous ?? now);
      this.nextAvailableMs = scheduledAt + this.intervalMs;

      const ms = scheduledAt - now;
      if (ms <= 0) return;
      try {
        await this.sleep(ms, signal);
      } catch (err) {
        // Waiters run one at a time, so nobody has been scheduled behind this slot yet.
        this.nextAvailableMs = previous;
        throw err;
      }
    });

    // Callers observe rejections through `wait`; the chain itself must keep going.
    this.tail = wait.then(
      () => undefined,
      () => undefined,
    );
    return wait;
  }
}

/** One limiter per process, shared by every fetcher that does not bring its own. */
export const sharedRateLimiter = new RateLimiter();
